export { LexicalIndex, LexicalIndexError } from "./lexicalIndex";
