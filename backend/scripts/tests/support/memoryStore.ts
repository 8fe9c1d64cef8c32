import { canTransition } from "../../../src/analysisStatus.js";
import {
  StoreError,
  UNIQUE_VIOLATION,
  type AnalysisOutcome,
  type NewAnalysis,
  type NutritionStore,
} from "../../../src/nutritionStore.js";
import type {
  Allergen,
  AllergenDetection,
  AllergenDetectionWithAllergen,
  FoodImage,
  NewFoodImage,
  NutritionalAnalysis,
  User,
  UserUpdate,
} from "../../../src/types.js";

const newestFirst = <T extends { id: number; createdAt: string }>(a: T, b: T): number =>
  b.createdAt.localeCompare(a.createdAt) || b.id - a.id;

/** In-process NutritionStore; createdAt values strictly increase per insert. */
export class MemoryNutritionStore implements NutritionStore {
  readonly users = new Map<number, User>();
  readonly images = new Map<number, FoodImage>();
  readonly analyses = new Map<number, NutritionalAnalysis>();
  readonly allergens = new Map<number, Allergen>();
  readonly detections: AllergenDetection[] = [];

  /** Set to make the next finalizeAnalysis call throw. */
  failNextFinalize: Error | null = null;

  private nextId = 1;
  private tick = 0;

  private id(): number {
    return this.nextId++;
  }

  private timestamp(): string {
    this.tick += 1;
    return new Date(Date.UTC(2024, 0, 1, 0, 0, this.tick)).toISOString();
  }

  async insertUser(input: { name: string; email: string }): Promise<User> {
    if (await this.findUserByEmail(input.email)) {
      throw new StoreError(`duplicate email ${input.email}`, UNIQUE_VIOLATION);
    }
    const user: User = { id: this.id(), name: input.name, email: input.email, isActive: true, createdAt: this.timestamp() };
    this.users.set(user.id, user);
    return { ...user };
  }

  async findUserById(id: number): Promise<User | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async findUserByEmail(email: string): Promise<User | null> {
    const user = [...this.users.values()].find((candidate) => candidate.email === email);
    return user ? { ...user } : null;
  }

  async updateUser(id: number, patch: UserUpdate): Promise<User | null> {
    const user = this.users.get(id);
    if (!user) return null;
    if (patch.email !== undefined && patch.email !== user.email && (await this.findUserByEmail(patch.email))) {
      throw new StoreError(`duplicate email ${patch.email}`, UNIQUE_VIOLATION);
    }
    const updated: User = {
      ...user,
      name: patch.name ?? user.name,
      email: patch.email ?? user.email,
      isActive: patch.isActive ?? user.isActive,
    };
    this.users.set(id, updated);
    return { ...updated };
  }

  async insertFoodImage(input: NewFoodImage): Promise<FoodImage> {
    const image: FoodImage = { ...input, id: this.id(), createdAt: this.timestamp() };
    this.images.set(image.id, image);
    return { ...image };
  }

  async findFoodImage(id: number): Promise<FoodImage | null> {
    const image = this.images.get(id);
    return image ? { ...image } : null;
  }

  async listFoodImagesByUser(userId: number, limit?: number): Promise<FoodImage[]> {
    const images = [...this.images.values()].filter((image) => image.userId === userId).sort(newestFirst);
    return (limit === undefined ? images : images.slice(0, limit)).map((image) => ({ ...image }));
  }

  async deleteFoodImage(id: number): Promise<boolean> {
    return this.images.delete(id);
  }

  async insertAnalysis(input: NewAnalysis): Promise<NutritionalAnalysis> {
    const analysis: NutritionalAnalysis = {
      id: this.id(),
      foodImageId: input.foodImageId,
      status: input.status,
      aiModelUsed: input.aiModelUsed,
      foodItems: [],
      confidenceScore: 0,
      calories: null,
      proteinG: null,
      carbohydratesG: null,
      totalFatG: null,
      saturatedFatG: null,
      fiberG: null,
      sugarG: null,
      sodiumMg: null,
      estimatedPortionG: null,
      totalCalories: null,
      vitamins: {},
      minerals: {},
      processingTimeMs: null,
      errorMessage: null,
      createdAt: this.timestamp(),
    };
    this.analyses.set(analysis.id, analysis);
    return { ...analysis };
  }

  async finalizeAnalysis(id: number, outcome: AnalysisOutcome): Promise<NutritionalAnalysis> {
    if (this.failNextFinalize) {
      const error = this.failNextFinalize;
      this.failNextFinalize = null;
      throw error;
    }

    const current = this.analyses.get(id);
    if (!current) {
      throw new StoreError(`analysis ${id} not found`, "P0002");
    }
    if (!canTransition(current.status, outcome.status)) {
      throw new StoreError(`invalid status transition ${current.status} -> ${outcome.status}`, "22023");
    }

    if (outcome.status === "failed") {
      const failed: NutritionalAnalysis = {
        ...current,
        status: "failed",
        processingTimeMs: outcome.processingTimeMs,
        errorMessage: outcome.errorMessage,
      };
      this.analyses.set(id, failed);
      return { ...failed };
    }

    const completed: NutritionalAnalysis = {
      ...current,
      ...outcome.fields,
      status: "completed",
      processingTimeMs: outcome.processingTimeMs,
      errorMessage: null,
    };
    for (const detected of outcome.allergens) {
      const allergen = this.upsertAllergen(detected.name);
      this.detections.push({
        id: this.id(),
        nutritionalAnalysisId: id,
        allergenId: allergen.id,
        confidenceScore: detected.confidence,
        detectedIn: detected.detectedIn,
      });
    }
    this.analyses.set(id, completed);
    return { ...completed };
  }

  private upsertAllergen(name: string): Allergen {
    const existing = [...this.allergens.values()].find((allergen) => allergen.name === name);
    if (existing) return existing;
    const allergen: Allergen = {
      id: this.id(),
      name,
      description: `Common allergen: ${name}`,
      severityLevel: "moderate",
    };
    this.allergens.set(allergen.id, allergen);
    return allergen;
  }

  async findAnalysis(id: number): Promise<NutritionalAnalysis | null> {
    const analysis = this.analyses.get(id);
    return analysis ? { ...analysis } : null;
  }

  async listDetections(analysisId: number): Promise<AllergenDetectionWithAllergen[]> {
    const rows: AllergenDetectionWithAllergen[] = [];
    for (const detection of this.detections) {
      if (detection.nutritionalAnalysisId !== analysisId) continue;
      const allergen = this.allergens.get(detection.allergenId);
      if (!allergen) {
        throw new StoreError(`allergen ${detection.allergenId} missing`);
      }
      rows.push({ ...detection, allergen: { ...allergen } });
    }
    return rows;
  }

  async listRecentAnalyses(limit: number): Promise<NutritionalAnalysis[]> {
    return [...this.analyses.values()].sort(newestFirst).slice(0, limit).map((analysis) => ({ ...analysis }));
  }

  async listAnalysesByImage(foodImageId: number): Promise<NutritionalAnalysis[]> {
    return [...this.analyses.values()]
      .filter((analysis) => analysis.foodImageId === foodImageId)
      .sort(newestFirst)
      .map((analysis) => ({ ...analysis }));
  }
}
