/**
 * ts-derivegen: runtime entry point
 * Helpers imported by derived modules
 */

export { Cases, Collections, Json, JsonValue, Tuple, Variant, match } from "./runtime";
