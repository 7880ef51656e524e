/**
 * Central export point for all library modules
 */

export * from "./types";
export * from "./config";
export * from "./logger";
export * from "./audit";
export * from "./utils";
export * from "./pattern";
export * from "./registry";
export * from "./composer";
export * from "./simplifier";
export * from "./normalizer";
export * from "./recursion";
export * from "./derive";
export * from "./render";
export * from "./provider-selector";
export * from "./request-loader";
export * from "./emitter";
export * from "./build";
export * from "./catalog";
export * as builders from "./builders";
export * as expressions from "./expression";
export * as resolvedTypes from "./resolved-type";
