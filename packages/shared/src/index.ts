export { ErrorCode, type ErrorCodeValue } from "./error-codes.js";
export { DonaError, type DonaErrorBody, isDonaError } from "./errors.js";
export * from "./validation.js";
