// @reinforce-lab/shared — policy-gradient core, config, schemas, logging, LLM clients
export * from "./types.js";
export * from "./schemas.js";
export * from "./config.js";
export * from "./logger.js";
export * from "./policy/index.js";
export * from "./llm/index.js";
