export { classifyTags, TAG_RULES, type OsmTags, type TagRule, type TagClassification } from "./tag-rules.js";
export {
  KeywordTypeClassifier,
  DEFAULT_TYPE_KEYWORDS,
  type TypeClassifier,
  type TypeGuess,
} from "./keyword-classifier.js";
