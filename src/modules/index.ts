/**
 * Pipeline modules export
 */

export { locate, ConverterNotFoundError } from "./locator";
export { scan } from "./scanner";
export { process } from "./processor";
export { stats } from "./stats";
