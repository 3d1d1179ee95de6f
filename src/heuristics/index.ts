export type { JSONType } from './parsing.js';
export {
  ExtractJSON,
  extractJSONFromText,
  IsBoolean,
  IsJSON,
  IsJSONArray,
  IsJSONObject,
  IsNumber,
  IsXML,
  JSONHasKeys,
  JSONSchemaValid,
  jsonTypeOf,
} from './parsing.js';
export type { PatternOptions } from './pattern.js';
export {
  DateFormat,
  EmailFormat,
  PhoneFormat,
  RegexFindAll,
  RegexMatch,
  RegexNotMatch,
  URLFormat,
  UUIDFormat,
} from './pattern.js';
export type { CaseOptions, JaccardTokens } from './similarity.js';
export {
  BLEU,
  CosineSimilarity,
  FuzzyMatch,
  JaccardSimilarity,
  LevenshteinSimilarity,
  ROUGE,
  SemanticSimilarity,
} from './similarity.js';
export {
  Contains,
  ContainsAll,
  ContainsAny,
  EndsWith,
  Equals,
  LengthBetween,
  NoOffensiveLanguage,
  NotEmpty,
  StartsWith,
  WordCount,
} from './string.js';
export {
  BLEU_SMOOTHING,
  bleuScore,
  brevityPenalty,
  cosineSimilarity,
  jaccardIndex,
  lcsLength,
  levenshteinDistance,
  levenshteinSimilarity,
  ngramCounts,
  ngramPrecision,
  rougeLScore,
  wordFrequency,
  words,
} from './text.js';
