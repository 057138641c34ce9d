// Re-export all models
export * from "./models/index.js";

// Re-export lookup tables
export * from "./tables/index.js";
