/**
 * NutritionStore backed by Supabase (PostgREST).
 * Table layout lives in ../sql/schema.sql.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import {
    StoreError,
    type AnalysisOutcome,
    type NewAnalysis,
    type NutritionStore,
} from './nutritionStore.js';
import type {
    Allergen,
    AllergenDetectionWithAllergen,
    AnalysisStatus,
    FoodImage,
    ImageSourceType,
    NewFoodImage,
    NutritionalAnalysis,
    User,
    UserUpdate,
} from './types.js';

// ============================================================================
// ROW TYPES
// ============================================================================

interface UserRow {
    id: number;
    name: string;
    email: string;
    is_active: boolean;
    created_at: string;
}

interface FoodImageRow {
    id: number;
    user_id: number;
    filename: string;
    original_filename: string;
    file_path: string;
    file_size: number;
    width: number;
    height: number;
    mime_type: string;
    source_type: ImageSourceType;
    created_at: string;
}

interface AnalysisRow {
    id: number;
    food_image_id: number;
    status: AnalysisStatus;
    ai_model_used: string;
    food_items: string[] | null;
    confidence_score: number | null;
    calories: number | null;
    protein_g: number | null;
    carbohydrates_g: number | null;
    total_fat_g: number | null;
    saturated_fat_g: number | null;
    fiber_g: number | null;
    sugar_g: number | null;
    sodium_mg: number | null;
    estimated_portion_g: number | null;
    total_calories: number | null;
    vitamins: Record<string, number> | null;
    minerals: Record<string, number> | null;
    processing_time_ms: number | null;
    error_message: string | null;
    created_at: string;
}

interface AllergenRow {
    id: number;
    name: string;
    description: string | null;
    severity_level: string;
}

interface DetectionRow {
    id: number;
    nutritional_analysis_id: number;
    allergen_id: number;
    confidence_score: number;
    detected_in: string | null;
    allergens: AllergenRow;
}

type PostgrestErrorLike = { message: string; code?: string } | null;

// PGRST116 = no rows found
const isNotFound = (error: PostgrestErrorLike): boolean => error?.code === 'PGRST116';

const toStoreError = (context: string, error: { message: string; code?: string }): StoreError =>
    new StoreError(`${context}: ${error.message}`, error.code ?? null);

// ============================================================================
// MAPPERS
// ============================================================================

const toUser = (row: UserRow): User => ({
    id: row.id,
    name: row.name,
    email: row.email,
    isActive: row.is_active,
    createdAt: row.created_at,
});

const toFoodImage = (row: FoodImageRow): FoodImage => ({
    id: row.id,
    userId: row.user_id,
    filename: row.filename,
    originalFilename: row.original_filename,
    filePath: row.file_path,
    fileSize: row.file_size,
    width: row.width,
    height: row.height,
    mimeType: row.mime_type,
    sourceType: row.source_type,
    createdAt: row.created_at,
});

const toAnalysis = (row: AnalysisRow): NutritionalAnalysis => ({
    id: row.id,
    foodImageId: row.food_image_id,
    status: row.status,
    aiModelUsed: row.ai_model_used,
    foodItems: row.food_items ?? [],
    confidenceScore: row.confidence_score ?? 0,
    calories: row.calories,
    proteinG: row.protein_g,
    carbohydratesG: row.carbohydrates_g,
    totalFatG: row.total_fat_g,
    saturatedFatG: row.saturated_fat_g,
    fiberG: row.fiber_g,
    sugarG: row.sugar_g,
    sodiumMg: row.sodium_mg,
    estimatedPortionG: row.estimated_portion_g,
    totalCalories: row.total_calories,
    vitamins: row.vitamins ?? {},
    minerals: row.minerals ?? {},
    processingTimeMs: row.processing_time_ms,
    errorMessage: row.error_message,
    createdAt: row.created_at,
});

const toAllergen = (row: AllergenRow): Allergen => ({
    id: row.id,
    name: row.name,
    description: row.description,
    severityLevel: row.severity_level,
});

// ============================================================================
// STORE
// ============================================================================

export class SupabaseNutritionStore implements NutritionStore {
    constructor(private readonly client: SupabaseClient) {}

    async insertUser(input: { name: string; email: string }): Promise<User> {
        const { data, error } = await this.client
            .from('users')
            .insert({ name: input.name, email: input.email })
            .select('*')
            .single();

        if (error || !data) {
            throw toStoreError('users insert failed', error ?? { message: 'no row returned' });
        }
        return toUser(data as UserRow);
    }

    async findUserById(id: number): Promise<User | null> {
        const { data, error } = await this.client.from('users').select('*').eq('id', id).maybeSingle();
        if (error && !isNotFound(error)) {
            throw toStoreError('users lookup failed', error);
        }
        return data ? toUser(data as UserRow) : null;
    }

    async findUserByEmail(email: string): Promise<User | null> {
        const { data, error } = await this.client.from('users').select('*').eq('email', email).maybeSingle();
        if (error && !isNotFound(error)) {
            throw toStoreError('users lookup failed', error);
        }
        return data ? toUser(data as UserRow) : null;
    }

    async updateUser(id: number, patch: UserUpdate): Promise<User | null> {
        const updatePayload: Record<string, unknown> = {};
        if (patch.name !== undefined) updatePayload.name = patch.name;
        if (patch.email !== undefined) updatePayload.email = patch.email;
        if (patch.isActive !== undefined) updatePayload.is_active = patch.isActive;

        if (Object.keys(updatePayload).length === 0) {
            return this.findUserById(id);
        }

        const { data, error } = await this.client
            .from('users')
            .update(updatePayload)
            .eq('id', id)
            .select('*')
            .maybeSingle();

        if (error && !isNotFound(error)) {
            throw toStoreError('users update failed', error);
        }
        return data ? toUser(data as UserRow) : null;
    }

    async insertFoodImage(input: NewFoodImage): Promise<FoodImage> {
        const { data, error } = await this.client
            .from('food_images')
            .insert({
                user_id: input.userId,
                filename: input.filename,
                original_filename: input.originalFilename,
                file_path: input.filePath,
                file_size: input.fileSize,
                width: input.width,
                height: input.height,
                mime_type: input.mimeType,
                source_type: input.sourceType,
            })
            .select('*')
            .single();

        if (error || !data) {
            throw toStoreError('food_images insert failed', error ?? { message: 'no row returned' });
        }
        return toFoodImage(data as FoodImageRow);
    }

    async findFoodImage(id: number): Promise<FoodImage | null> {
        const { data, error } = await this.client.from('food_images').select('*').eq('id', id).maybeSingle();
        if (error && !isNotFound(error)) {
            throw toStoreError('food_images lookup failed', error);
        }
        return data ? toFoodImage(data as FoodImageRow) : null;
    }

    async listFoodImagesByUser(userId: number, limit?: number): Promise<FoodImage[]> {
        let query = this.client
            .from('food_images')
            .select('*')
            .eq('user_id', userId)
            .order('created_at', { ascending: false })
            .order('id', { ascending: false });
        if (limit !== undefined) {
            query = query.limit(limit);
        }

        const { data, error } = await query;
        if (error) {
            throw toStoreError('food_images list failed', error);
        }
        return ((data ?? []) as FoodImageRow[]).map(toFoodImage);
    }

    async deleteFoodImage(id: number): Promise<boolean> {
        const { data, error } = await this.client.from('food_images').delete().eq('id', id).select('id');
        if (error) {
            throw toStoreError('food_images delete failed', error);
        }
        return (data?.length ?? 0) > 0;
    }

    async insertAnalysis(input: NewAnalysis): Promise<NutritionalAnalysis> {
        const { data, error } = await this.client
            .from('nutritional_analyses')
            .insert({
                food_image_id: input.foodImageId,
                status: input.status,
                ai_model_used: input.aiModelUsed,
            })
            .select('*')
            .single();

        if (error || !data) {
            throw toStoreError('nutritional_analyses insert failed', error ?? { message: 'no row returned' });
        }
        return toAnalysis(data as AnalysisRow);
    }

    async finalizeAnalysis(id: number, outcome: AnalysisOutcome): Promise<NutritionalAnalysis> {
        // One rpc call = one transaction: analysis update, allergen upserts and detections.
        const params =
            outcome.status === 'completed'
                ? {
                      p_analysis_id: id,
                      p_status: outcome.status,
                      p_processing_time_ms: outcome.processingTimeMs,
                      p_error_message: null,
                      p_fields: {
                          food_items: outcome.fields.foodItems,
                          confidence_score: outcome.fields.confidenceScore,
                          calories: outcome.fields.calories,
                          protein_g: outcome.fields.proteinG,
                          carbohydrates_g: outcome.fields.carbohydratesG,
                          total_fat_g: outcome.fields.totalFatG,
                          saturated_fat_g: outcome.fields.saturatedFatG,
                          fiber_g: outcome.fields.fiberG,
                          sugar_g: outcome.fields.sugarG,
                          sodium_mg: outcome.fields.sodiumMg,
                          estimated_portion_g: outcome.fields.estimatedPortionG,
                          total_calories: outcome.fields.totalCalories,
                          vitamins: outcome.fields.vitamins,
                          minerals: outcome.fields.minerals,
                      },
                      p_allergens: outcome.allergens.map((allergen) => ({
                          name: allergen.name,
                          confidence: allergen.confidence,
                          detected_in: allergen.detectedIn,
                      })),
                  }
                : {
                      p_analysis_id: id,
                      p_status: outcome.status,
                      p_processing_time_ms: outcome.processingTimeMs,
                      p_error_message: outcome.errorMessage,
                      p_fields: null,
                      p_allergens: [],
                  };

        const { data, error } = await this.client.rpc('finalize_nutritional_analysis', params).single();
        if (error || !data) {
            throw toStoreError('finalize_nutritional_analysis failed', error ?? { message: 'no row returned' });
        }
        return toAnalysis(data as AnalysisRow);
    }

    async findAnalysis(id: number): Promise<NutritionalAnalysis | null> {
        const { data, error } = await this.client
            .from('nutritional_analyses')
            .select('*')
            .eq('id', id)
            .maybeSingle();
        if (error && !isNotFound(error)) {
            throw toStoreError('nutritional_analyses lookup failed', error);
        }
        return data ? toAnalysis(data as AnalysisRow) : null;
    }

    async listDetections(analysisId: number): Promise<AllergenDetectionWithAllergen[]> {
        const { data, error } = await this.client
            .from('allergen_detections')
            .select('*, allergens(*)')
            .eq('nutritional_analysis_id', analysisId)
            .order('id', { ascending: true });

        if (error) {
            throw toStoreError('allergen_detections list failed', error);
        }
        return ((data ?? []) as DetectionRow[]).map((row) => ({
            id: row.id,
            nutritionalAnalysisId: row.nutritional_analysis_id,
            allergenId: row.allergen_id,
            confidenceScore: row.confidence_score,
            detectedIn: row.detected_in,
            allergen: toAllergen(row.allergens),
        }));
    }

    async listRecentAnalyses(limit: number): Promise<NutritionalAnalysis[]> {
        const { data, error } = await this.client
            .from('nutritional_analyses')
            .select('*')
            .order('created_at', { ascending: false })
            .order('id', { ascending: false })
            .limit(limit);
        if (error) {
            throw toStoreError('nutritional_analyses list failed', error);
        }
        return ((data ?? []) as AnalysisRow[]).map(toAnalysis);
    }

    async listAnalysesByImage(foodImageId: number): Promise<NutritionalAnalysis[]> {
        const { data, error } = await this.client
            .from('nutritional_analyses')
            .select('*')
            .eq('food_image_id', foodImageId)
            .order('created_at', { ascending: false })
            .order('id', { ascending: false });
        if (error) {
            throw toStoreError('nutritional_analyses list failed', error);
        }
        return ((data ?? []) as AnalysisRow[]).map(toAnalysis);
    }
}
