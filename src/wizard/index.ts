/**
 * Wizard Module Exports
 */

export * from "./types.js";
export * from "./errors.js";
export * from "./prompt-classifier.js";
export * from "./response-planner.js";
export * from "./terminal-session.js";
export { runWizard, verifyArtifact, WIZARD_ARGS, ARTIFACT_FILE } from "./driver.js";
export type { WizardRunOptions, WizardRunResult, WizardStep } from "./driver.js";
