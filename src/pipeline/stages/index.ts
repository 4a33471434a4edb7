import type { StageDefinition } from "../context";
import { convertStage } from "./convert";
import { denoiseStage } from "./denoise";
import { diversityStage } from "./diversity";
import { exportStage } from "./export";
import { importStage } from "./import";
import { phylogenyStage } from "./phylogeny";
import { setupStage } from "./setup";
import { taxonomyStage } from "./taxonomy";

/**
 * Stage definitions in execution order; matches STAGE_ORDER
 */
export const STAGES: readonly StageDefinition[] = [
  setupStage,
  convertStage,
  importStage,
  denoiseStage,
  taxonomyStage,
  phylogenyStage,
  diversityStage,
  exportStage,
];

export { convertStage, listFilesWithExtension, swapExtension } from "./convert";
export { clearDirectory, diversityStage } from "./diversity";
export { denoiseStage } from "./denoise";
export { exportStage } from "./export";
export { importStage, preflight, type PreflightResult } from "./import";
export { phylogenyStage } from "./phylogeny";
export { setupStage } from "./setup";
export { taxonomyStage } from "./taxonomy";
