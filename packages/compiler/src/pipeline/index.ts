export { generate, type GenerationResult, type TypesArtifact } from "./generate.js";
