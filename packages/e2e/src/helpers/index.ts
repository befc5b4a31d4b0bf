/**
 * E2E Test Helpers
 *
 * Barrel export for all test helper modules.
 */

export * from "./constants.js";
export * from "./control-plane.js";
export * from "./process-manager.js";
export * from "./wait.js";
export * from "./test-fixture.js";
