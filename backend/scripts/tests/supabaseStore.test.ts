import assert from "node:assert/strict";
import { test } from "node:test";

import { StoreError, isUniqueViolation } from "../../src/nutritionStore.js";
import { createSupabaseClient } from "../../src/supabase.js";
import { SupabaseNutritionStore } from "../../src/supabaseStore.js";
import type { NutritionFields } from "../../src/types.js";

interface RecordedRequest {
  url: URL;
  method: string;
  headers: Headers;
  body: unknown;
}

interface ScriptedResponse {
  status?: number;
  body: unknown;
}

/** Answers PostgREST calls in order and records what was sent. */
const setup = (responses: ScriptedResponse[]) => {
  const requests: RecordedRequest[] = [];
  const fakeFetch: typeof fetch = async (input, init) => {
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
    const rawBody = init?.body;
    requests.push({
      url,
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof rawBody === "string" ? JSON.parse(rawBody) : undefined,
    });

    const next = responses.shift();
    if (!next) {
      throw new Error(`Unexpected request to ${url.pathname}`);
    }
    return new Response(JSON.stringify(next.body), {
      status: next.status ?? 200,
      headers: { "Content-Type": "application/json" },
    });
  };

  const client = createSupabaseClient({ url: "http://supabase.test", serviceRoleKey: "test-secret" }, fakeFetch);
  return { store: new SupabaseNutritionStore(client), requests };
};

const analysisRow = {
  id: 7,
  food_image_id: 3,
  status: "completed",
  ai_model_used: "test-model",
  food_items: ["rice", "omelette"],
  confidence_score: 0.8,
  calories: 150,
  protein_g: 6,
  carbohydrates_g: 20,
  total_fat_g: 5,
  saturated_fat_g: null,
  fiber_g: null,
  sugar_g: null,
  sodium_mg: 300,
  estimated_portion_g: 200,
  total_calories: 300,
  vitamins: { vitamin_c: 2 },
  minerals: {},
  processing_time_ms: 42,
  error_message: null,
  created_at: "2026-01-01T00:00:00Z",
};

const fields: NutritionFields = {
  foodItems: ["rice", "omelette"],
  confidenceScore: 0.8,
  calories: 150,
  proteinG: 6,
  carbohydratesG: 20,
  totalFatG: 5,
  saturatedFatG: null,
  fiberG: null,
  sugarG: null,
  sodiumMg: 300,
  estimatedPortionG: 200,
  totalCalories: 300,
  vitamins: { vitamin_c: 2 },
  minerals: {},
};

test("finalizeAnalysis sends a completed outcome as one rpc call", async () => {
  const { store, requests } = setup([{ body: analysisRow }]);

  const analysis = await store.finalizeAnalysis(7, {
    status: "completed",
    processingTimeMs: 42,
    fields,
    allergens: [{ name: "egg", confidence: 0.9, detectedIn: "omelette" }],
  });

  assert.equal(requests.length, 1);
  assert.equal(requests[0].method, "POST");
  assert.equal(requests[0].url.pathname, "/rest/v1/rpc/finalize_nutritional_analysis");
  assert.equal(requests[0].headers.get("apikey"), "test-secret");
  assert.deepEqual(requests[0].body, {
    p_analysis_id: 7,
    p_status: "completed",
    p_processing_time_ms: 42,
    p_error_message: null,
    p_fields: {
      food_items: ["rice", "omelette"],
      confidence_score: 0.8,
      calories: 150,
      protein_g: 6,
      carbohydrates_g: 20,
      total_fat_g: 5,
      saturated_fat_g: null,
      fiber_g: null,
      sugar_g: null,
      sodium_mg: 300,
      estimated_portion_g: 200,
      total_calories: 300,
      vitamins: { vitamin_c: 2 },
      minerals: {},
    },
    p_allergens: [{ name: "egg", confidence: 0.9, detected_in: "omelette" }],
  });

  assert.deepEqual(analysis, {
    id: 7,
    foodImageId: 3,
    status: "completed",
    aiModelUsed: "test-model",
    ...fields,
    processingTimeMs: 42,
    errorMessage: null,
    createdAt: "2026-01-01T00:00:00Z",
  });
});

test("finalizeAnalysis sends a failed outcome without fields or allergens", async () => {
  const failedRow = {
    ...analysisRow,
    id: 8,
    status: "failed",
    food_items: null,
    confidence_score: null,
    vitamins: null,
    minerals: null,
    processing_time_ms: 15,
    error_message: "model unavailable",
  };
  const { store, requests } = setup([{ body: failedRow }]);

  const analysis = await store.finalizeAnalysis(8, {
    status: "failed",
    processingTimeMs: 15,
    errorMessage: "model unavailable",
  });

  assert.deepEqual(requests[0].body, {
    p_analysis_id: 8,
    p_status: "failed",
    p_processing_time_ms: 15,
    p_error_message: "model unavailable",
    p_fields: null,
    p_allergens: [],
  });
  assert.equal(analysis.status, "failed");
  assert.equal(analysis.errorMessage, "model unavailable");
  assert.deepEqual(analysis.foodItems, []);
  assert.equal(analysis.confidenceScore, 0);
  assert.deepEqual(analysis.vitamins, {});
});

test("finalizeAnalysis raises a StoreError carrying the database code", async () => {
  const { store } = setup([{ status: 400, body: { code: "P0001", message: "analysis 9 is not processing" } }]);

  await assert.rejects(
    store.finalizeAnalysis(9, { status: "failed", processingTimeMs: 1, errorMessage: "x" }),
    (error: unknown) =>
      error instanceof StoreError &&
      error.code === "P0001" &&
      error.message === "finalize_nutritional_analysis failed: analysis 9 is not processing",
  );
});

test("listDetections embeds the allergen row and maps it", async () => {
  const { store, requests } = setup([
    {
      body: [
        {
          id: 1,
          nutritional_analysis_id: 7,
          allergen_id: 4,
          confidence_score: 0.9,
          detected_in: "omelette",
          allergens: { id: 4, name: "egg", description: "Common allergen: egg", severity_level: "moderate" },
        },
      ],
    },
  ]);

  const detections = await store.listDetections(7);

  const { url } = requests[0];
  assert.equal(url.pathname, "/rest/v1/allergen_detections");
  assert.equal(url.searchParams.get("select"), "*,allergens(*)");
  assert.equal(url.searchParams.get("nutritional_analysis_id"), "eq.7");
  assert.equal(url.searchParams.get("order"), "id.asc");
  assert.deepEqual(detections, [
    {
      id: 1,
      nutritionalAnalysisId: 7,
      allergenId: 4,
      confidenceScore: 0.9,
      detectedIn: "omelette",
      allergen: { id: 4, name: "egg", description: "Common allergen: egg", severityLevel: "moderate" },
    },
  ]);
});

test("findUserById maps a row and returns null when none match", async () => {
  const { store, requests } = setup([
    { body: [] },
    {
      body: [{ id: 5, name: "Ada", email: "ada@example.com", is_active: true, created_at: "2026-01-02T00:00:00Z" }],
    },
  ]);

  assert.equal(await store.findUserById(5), null);
  assert.equal(requests[0].url.searchParams.get("id"), "eq.5");

  assert.deepEqual(await store.findUserById(5), {
    id: 5,
    name: "Ada",
    email: "ada@example.com",
    isActive: true,
    createdAt: "2026-01-02T00:00:00Z",
  });
});

test("insertUser reports a duplicate email as a unique violation", async () => {
  const { store, requests } = setup([
    { status: 409, body: { code: "23505", message: 'duplicate key value violates unique constraint "users_email_key"' } },
  ]);

  await assert.rejects(store.insertUser({ name: "Ada", email: "ada@example.com" }), (error: unknown) =>
    isUniqueViolation(error),
  );
  assert.equal(requests[0].method, "POST");
  assert.equal(requests[0].url.pathname, "/rest/v1/users");
  assert.deepEqual(requests[0].body, { name: "Ada", email: "ada@example.com" });
});
