export type ImageSourceType = "upload" | "camera";

export const IMAGE_SOURCE_TYPES = ["upload", "camera"] as const satisfies readonly ImageSourceType[];

export type AnalysisStatus = "pending" | "processing" | "completed" | "failed";

export interface User {
  id: number;
  name: string;
  email: string;
  isActive: boolean;
  createdAt: string;
}

export interface UserUpdate {
  name?: string;
  email?: string;
  isActive?: boolean;
}

export interface FoodImage {
  id: number;
  userId: number;
  filename: string;
  originalFilename: string;
  filePath: string;
  fileSize: number;
  width: number;
  height: number;
  mimeType: string;
  sourceType: ImageSourceType;
  createdAt: string;
}

export type NewFoodImage = Omit<FoodImage, "id" | "createdAt">;

/**
 * Nutrition values are per 100 g unless the name says otherwise.
 * `null` means the model did not report the value (or reported 0).
 */
export interface NutritionFields {
  foodItems: string[];
  confidenceScore: number;
  calories: number | null;
  proteinG: number | null;
  carbohydratesG: number | null;
  totalFatG: number | null;
  saturatedFatG: number | null;
  fiberG: number | null;
  sugarG: number | null;
  sodiumMg: number | null;
  estimatedPortionG: number | null;
  totalCalories: number | null;
  vitamins: Record<string, number>;
  minerals: Record<string, number>;
}

export interface NutritionalAnalysis extends NutritionFields {
  id: number;
  foodImageId: number;
  status: AnalysisStatus;
  aiModelUsed: string;
  processingTimeMs: number | null;
  errorMessage: string | null;
  createdAt: string;
}

export interface Allergen {
  id: number;
  name: string;
  description: string | null;
  severityLevel: string;
}

export interface AllergenDetection {
  id: number;
  nutritionalAnalysisId: number;
  allergenId: number;
  confidenceScore: number;
  detectedIn: string | null;
}

export interface AllergenDetectionWithAllergen extends AllergenDetection {
  allergen: Allergen;
}

/** Allergen as reported by the model, after name normalization. */
export interface DetectedAllergen {
  name: string;
  confidence: number;
  detectedIn: string | null;
}

export interface AnalysisWithAllergens {
  analysis: NutritionalAnalysis;
  detections: AllergenDetectionWithAllergen[];
}

export interface ErrorResponse {
  error: string;
  detail?: string;
  statusCode?: number;
}
