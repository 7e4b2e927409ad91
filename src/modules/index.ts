/**
 * Pipeline modules export
 */

export { convertPdf } from "./converter";
export { convertFromUrl } from "./fetcher";
export { convertDirectory } from "./batch";
export { sharpWriter } from "./codec";
export { getSkillInfo } from "./skill-info";
