import { z } from "zod";

import type { DetectedAllergen, NutritionFields } from "./types.js";

export class PayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PayloadError";
  }
}

const DEFAULT_ALLERGEN_CONFIDENCE = 0.5;

const toFiniteNumber = (value: unknown): number | null => {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

/** Missing and falsy values (0, "", false, null) are absent; anything else must be numeric. */
const optionalNumber = (value: unknown, field: string): number | null => {
  if (!value) return null;
  const parsed = toFiniteNumber(value);
  if (parsed === null) {
    throw new PayloadError(`Invalid numeric value for ${field}: ${JSON.stringify(value)}`);
  }
  return parsed;
};

const clampUnit = (value: number): number => Math.min(1, Math.max(0, value));

const NumericMapSchema = z
  .record(z.unknown())
  .transform((entries) => {
    const numeric: Record<string, number> = {};
    for (const [key, value] of Object.entries(entries)) {
      const parsed = toFiniteNumber(value);
      if (parsed !== null) numeric[key] = parsed;
    }
    return numeric;
  })
  .catch({});

const AllergenEntrySchema = z.object({
  name: z.string().catch(""),
  confidence: z.unknown(),
  detected_in: z.string().nullable().catch(null),
});

const PayloadSchema = z.object({
  food_items: z
    .array(z.unknown())
    .transform((items) => items.filter((item): item is string => typeof item === "string"))
    .catch([]),
  confidence_score: z.unknown(),
  nutritional_info: z.record(z.unknown()).catch({}),
  estimated_portion_g: z.unknown(),
  vitamins: NumericMapSchema,
  minerals: NumericMapSchema,
  allergens: z.array(z.unknown()).catch([]),
});

export interface MappedAnalysis {
  fields: NutritionFields;
  allergens: DetectedAllergen[];
}

const mapAllergens = (entries: unknown[]): DetectedAllergen[] => {
  const allergens: DetectedAllergen[] = [];
  for (const entry of entries) {
    const parsed = AllergenEntrySchema.safeParse(entry);
    if (!parsed.success) continue;

    const name = parsed.data.name.trim().toLowerCase();
    if (!name) continue;

    // Unlike the nutrition fields, an explicit 0 confidence is kept.
    const rawConfidence = parsed.data.confidence ?? DEFAULT_ALLERGEN_CONFIDENCE;
    const confidence = toFiniteNumber(rawConfidence);
    if (confidence === null) {
      throw new PayloadError(`Invalid confidence for allergen ${name}: ${JSON.stringify(rawConfidence)}`);
    }
    const detectedIn = parsed.data.detected_in?.trim();
    allergens.push({
      name,
      confidence: clampUnit(confidence),
      detectedIn: detectedIn ? detectedIn : null,
    });
  }
  return allergens;
};

/**
 * Maps a model payload onto analysis fields and detected allergens.
 * Throws PayloadError when a reported numeric field is not a number.
 */
export function mapAnalysisPayload(payload: Record<string, unknown>): MappedAnalysis {
  const data = PayloadSchema.parse(payload);
  const nutrition = data.nutritional_info;

  const calories = optionalNumber(nutrition.calories, "calories");
  const estimatedPortionG = optionalNumber(data.estimated_portion_g, "estimated_portion_g");

  const fields: NutritionFields = {
    foodItems: data.food_items,
    confidenceScore: clampUnit(optionalNumber(data.confidence_score, "confidence_score") ?? 0),
    calories,
    proteinG: optionalNumber(nutrition.protein_g, "protein_g"),
    carbohydratesG: optionalNumber(nutrition.carbohydrates_g, "carbohydrates_g"),
    totalFatG: optionalNumber(nutrition.total_fat_g, "total_fat_g"),
    saturatedFatG: optionalNumber(nutrition.saturated_fat_g, "saturated_fat_g"),
    fiberG: optionalNumber(nutrition.fiber_g, "fiber_g"),
    sugarG: optionalNumber(nutrition.sugar_g, "sugar_g"),
    sodiumMg: optionalNumber(nutrition.sodium_mg, "sodium_mg"),
    estimatedPortionG,
    totalCalories: calories && estimatedPortionG ? (calories * estimatedPortionG) / 100 : null,
    vitamins: data.vitamins,
    minerals: data.minerals,
  };

  return { fields, allergens: mapAllergens(data.allergens) };
}
