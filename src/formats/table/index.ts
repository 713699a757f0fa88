/**
 * @module formats/table
 * @description Result table output
 */

export { DEFAULT_MISSING_MARKER, ResultTableWriter } from "./writer";
