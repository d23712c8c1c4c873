export * from "./assembler.js";
export * from "./client.js";
export * from "./config.js";
export * from "./defaults.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./query.js";
export * from "./session.js";
export * from "./store.js";
export * from "./tideTable.js";
export * from "./time.js";
export * from "./tokenizer.js";
export * from "./utils.js";
