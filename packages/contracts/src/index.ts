export * from "./template-schema.js";
export * from "./result-schema.js";
export * from "./category-schema.js";
export * from "./api-contracts.js";
