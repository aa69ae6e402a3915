export * from "./classifier.js";
export * from "./pool.js";
export * from "./queue.js";
export * from "./rate-limiter.js";
export * from "./selection.js";
export * from "./task.js";
