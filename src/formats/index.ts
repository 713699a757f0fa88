/**
 * Input and output formats
 */

export * from "./coordinates";
export * from "./table";
