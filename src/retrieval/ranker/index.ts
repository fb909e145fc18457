export { cosineSimilarity, rankBySimilarity } from "./similarityRanker";
