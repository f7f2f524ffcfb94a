/**
 * inktrail telemetry
 *
 * Structured logging shared by the history core and the CLI.
 */

export * from "./logging";
