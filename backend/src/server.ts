import dotenv from "dotenv";

import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { ImageStore } from "./imageStore.js";
import { startMetricsFlush, stopMetricsFlush } from "./metrics.js";
import { NutritionAnalysisService } from "./nutritionAnalysis.js";
import { createSupabaseClient } from "./supabase.js";
import { SupabaseNutritionStore } from "./supabaseStore.js";
import { UserService } from "./userService.js";
import { createVisionAnalyzer } from "./visionClient.js";

dotenv.config();

const config = loadConfig();

const store = new SupabaseNutritionStore(createSupabaseClient(config.supabase));
const images = new ImageStore({
  uploadDir: config.uploadDir,
  maxFileBytes: config.maxUploadBytes,
  maxDimension: config.maxImageDimension,
});
const analyzer = createVisionAnalyzer(config.ai);

const app = createApp({
  users: new UserService(store, images),
  analyses: new NutritionAnalysisService(store, analyzer),
  analyzer,
});

startMetricsFlush();

process.on("unhandledRejection", (reason) => {
  console.error("[UNHANDLED_REJECTION]", reason);
});

process.on("uncaughtException", (err) => {
  console.error("[UNCAUGHT_EXCEPTION]", err);
  process.exit(1);
});

const server = app.listen(config.port, () => {
  console.log(`Nutrition backend listening on http://localhost:${config.port} (uploads: ${config.uploadDir}, model: ${analyzer.model})`);
});

process.on("SIGTERM", () => {
  console.log("[server] SIGTERM received, closing");
  stopMetricsFlush();
  server.close((err) => {
    if (err) {
      console.error("[server] Close failed", err);
      process.exit(1);
    }
    process.exit(0);
  });
});
