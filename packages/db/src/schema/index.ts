export * from "./indexing-runs.js";
export * from "./document-outcomes.js";
