/**
 * Nutrition Analysis Orchestrator
 * Runs one analysis per request: processing row first, then the AI call, then
 * a single atomic finalize that either completes the row (with allergen
 * detections) or marks it failed.
 */

import { mapAnalysisPayload } from "./analysisPayload.js";
import { canTransition } from "./analysisStatus.js";
import { incrementMetric } from "./metrics.js";
import type { AnalysisOutcome, NutritionStore } from "./nutritionStore.js";
import type { AnalysisWithAllergens, NutritionalAnalysis } from "./types.js";
import type { VisionAnalyzer } from "./visionClient.js";

export const AI_FAILURE_MESSAGE = "Failed to analyze image with AI";
export const MAX_ERROR_MESSAGE_LENGTH = 1000;
const DEFAULT_RECENT_LIMIT = 10;

/** Monotonic milliseconds. */
export type Clock = () => number;

const describeError = (error: unknown): string =>
  (error instanceof Error ? error.message : String(error)).slice(0, MAX_ERROR_MESSAGE_LENGTH);

export class NutritionAnalysisService {
  constructor(
    private readonly store: NutritionStore,
    private readonly analyzer: VisionAnalyzer,
    private readonly clock: Clock = () => performance.now(),
  ) {}

  /** Null only when the image does not exist; every other outcome is a persisted record. */
  async analyzeFoodImage(foodImageId: number): Promise<NutritionalAnalysis | null> {
    const image = await this.store.findFoodImage(foodImageId);
    if (!image) {
      console.warn(`[Analysis] Food image ${foodImageId} not found`);
      return null;
    }

    const analysis = await this.store.insertAnalysis({
      foodImageId,
      status: "processing",
      aiModelUsed: this.analyzer.model,
    });

    const startedAt = this.clock();
    const elapsedMs = () => Math.max(0, Math.floor(this.clock() - startedAt));

    try {
      const payload = await this.analyzer.analyzeImageFile(image.filePath, image.mimeType);
      if (!payload) {
        return await this.fail(analysis, elapsedMs(), AI_FAILURE_MESSAGE);
      }

      const { fields, allergens } = mapAnalysisPayload(payload);
      const completed = await this.finalize(analysis, {
        status: "completed",
        processingTimeMs: elapsedMs(),
        fields,
        allergens,
      });
      incrementMetric("analysis_completed");
      console.log(
        `[Analysis] ${analysis.id} completed in ${completed.processingTimeMs ?? 0}ms ` +
          `(${fields.foodItems.length} items, ${allergens.length} allergens)`,
      );
      return completed;
    } catch (error) {
      console.error(`[Analysis] ${analysis.id} failed:`, error);
      return this.fail(analysis, elapsedMs(), describeError(error));
    }
  }

  private async fail(
    analysis: NutritionalAnalysis,
    processingTimeMs: number,
    errorMessage: string,
  ): Promise<NutritionalAnalysis> {
    incrementMetric("analysis_failed");
    const outcome: AnalysisOutcome = { status: "failed", processingTimeMs, errorMessage };
    try {
      return await this.finalize(analysis, outcome);
    } catch (error) {
      // The row stays in processing; the caller still gets the failure.
      console.error(`[Analysis] Could not record failure for ${analysis.id}:`, error);
      return { ...analysis, status: "failed", processingTimeMs, errorMessage };
    }
  }

  private finalize(analysis: NutritionalAnalysis, outcome: AnalysisOutcome): Promise<NutritionalAnalysis> {
    if (!canTransition(analysis.status, outcome.status)) {
      throw new Error(`Invalid status transition ${analysis.status} -> ${outcome.status}`);
    }
    return this.store.finalizeAnalysis(analysis.id, outcome);
  }

  async getAnalysisWithAllergens(analysisId: number): Promise<AnalysisWithAllergens | null> {
    const analysis = await this.store.findAnalysis(analysisId);
    if (!analysis) return null;
    const detections = await this.store.listDetections(analysisId);
    return { analysis, detections };
  }

  getRecentAnalyses(limit = DEFAULT_RECENT_LIMIT): Promise<NutritionalAnalysis[]> {
    return this.store.listRecentAnalyses(limit);
  }

  getImageAnalyses(foodImageId: number): Promise<NutritionalAnalysis[]> {
    return this.store.listAnalysesByImage(foodImageId);
  }
}
