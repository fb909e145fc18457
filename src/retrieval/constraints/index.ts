export { extractDuration, parseItemDuration } from "./durationExtractor";
