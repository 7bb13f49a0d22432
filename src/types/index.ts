/**
 * Value types exchanged with the surrounding pipeline.
 */

export * from "./transcript.js";
export * from "./analysis.js";
export * from "./article.js";
export * from "./seo.js";
export * from "./results.js";
export * from "./wire.js";
export * from "./validation.js";
