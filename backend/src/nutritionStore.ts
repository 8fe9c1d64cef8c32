/**
 * Persistence port for users, food images, analyses and allergens.
 *
 * Every method is one logical operation. Implementations must apply
 * `finalizeAnalysis` atomically: the analysis update, allergen upserts and
 * detection inserts are either all visible or none are.
 */

import type {
  AllergenDetectionWithAllergen,
  AnalysisStatus,
  DetectedAllergen,
  FoodImage,
  NewFoodImage,
  NutritionFields,
  NutritionalAnalysis,
  User,
  UserUpdate,
} from "./types.js";

export const UNIQUE_VIOLATION = "23505";

export class StoreError extends Error {
  readonly code: string | null;

  constructor(message: string, code: string | null = null) {
    super(message);
    this.name = "StoreError";
    this.code = code;
  }
}

export const isUniqueViolation = (error: unknown): boolean =>
  error instanceof StoreError && error.code === UNIQUE_VIOLATION;

export type AnalysisOutcome =
  | {
      status: "completed";
      processingTimeMs: number;
      fields: NutritionFields;
      allergens: DetectedAllergen[];
    }
  | {
      status: "failed";
      processingTimeMs: number;
      errorMessage: string;
    };

export interface NewAnalysis {
  foodImageId: number;
  status: Extract<AnalysisStatus, "pending" | "processing">;
  aiModelUsed: string;
}

export interface NutritionStore {
  insertUser(input: { name: string; email: string }): Promise<User>;
  findUserById(id: number): Promise<User | null>;
  findUserByEmail(email: string): Promise<User | null>;
  updateUser(id: number, patch: UserUpdate): Promise<User | null>;

  insertFoodImage(input: NewFoodImage): Promise<FoodImage>;
  findFoodImage(id: number): Promise<FoodImage | null>;
  listFoodImagesByUser(userId: number, limit?: number): Promise<FoodImage[]>;
  deleteFoodImage(id: number): Promise<boolean>;

  insertAnalysis(input: NewAnalysis): Promise<NutritionalAnalysis>;
  /** Moves a `processing` analysis to its terminal state. */
  finalizeAnalysis(id: number, outcome: AnalysisOutcome): Promise<NutritionalAnalysis>;
  findAnalysis(id: number): Promise<NutritionalAnalysis | null>;
  listDetections(analysisId: number): Promise<AllergenDetectionWithAllergen[]>;
  listRecentAnalyses(limit: number): Promise<NutritionalAnalysis[]>;
  listAnalysesByImage(foodImageId: number): Promise<NutritionalAnalysis[]>;
}
