export {
  KeywordEffectClassifier,
  loadDefaultKeywords,
  tokenize,
  type KeywordTable,
} from "./KeywordEffectClassifier.js";
export { FixedEffectClassifier } from "./FixedEffectClassifier.js";
