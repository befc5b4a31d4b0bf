export { formatError } from "./format-error.js";
export { sleep, type SleepFn } from "./sleep.js";
