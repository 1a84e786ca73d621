/**
 * Guards Module Exports
 */

export * from "./anti-abuse.js";
