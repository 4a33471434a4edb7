export { type ExtractionResult, extractArchive } from "./zip";
