/**
 * Pipeline modules export
 */

export { collect } from "./collector";
export { sample } from "./sampler";
export { write } from "./writer";
export { manifest } from "./manifest";
export { stats } from "./stats";
