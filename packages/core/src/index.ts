export * from "./agentBuilder.js";
export * from "./app/app.js";
export * from "./app/content.js";
export * from "./app/keys.js";
export * from "./config.js";
export * from "./dataSource.js";
export * from "./dsl.js";
export * from "./errors.js";
export * from "./esClient.js";
export * from "./esql.js";
export * from "./eventQueue.js";
export * from "./fetchPipeline.js";
export * from "./fields.js";
export * from "./keymap.js";
export * from "./kibana.js";
export * from "./logEntry.js";
export * from "./logger.js";
export * from "./lookback.js";
export * from "./requests.js";
export * from "./selection.js";
export * from "./textInput.js";
export * from "./utils.js";
export * from "./viewport.js";
export * from "./viewStack.js";
