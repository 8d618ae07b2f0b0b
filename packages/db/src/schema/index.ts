export { documents, documentStatusEnum } from "./documents.js";
export { documentFiles, fileTypeEnum, fileProcessingStatusEnum } from "./document-files.js";
export { documentChunks } from "./document-chunks.js";
