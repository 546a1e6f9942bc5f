export * from './types.js';
export * from './tokenizer.js';
export * from './chunking.js';
export * from './embedding.js';
export * from './completion.js';
export * from './prompt.js';
export * from './denseIndex.js';
export * from './sparseIndex.js';
export * from './hybridRetriever.js';
export * from './answerGenerator.js';
export * from './knowledgeBase.js';
export * from './config.js';
export * from './pipeline.js';
export * from './loader.js';
export { RagToolContextSchema, type RagToolContext } from './tools/context.js';
export { buildIndexTool } from './tools/buildIndexTool.js';
export { askTool, formatAnswer } from './tools/askTool.js';
export { indexStatusTool } from './tools/indexStatusTool.js';
export { retrieveTool, toRetrievalPreview, type RetrievalPreview } from './tools/retrieveTool.js';
