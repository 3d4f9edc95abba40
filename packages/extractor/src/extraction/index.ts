export { extract } from './extract';
export { loadDocument } from './document';
export { selectFirstText } from './css';
export { searchPattern, isValidPattern } from './regex';
export { selectorStrategy, documentRegexStrategy, firstMatch, strategiesFor } from './strategies';
export type { ExtractionResult, ExtractionStrategy, ParsedDocument, StrategyOutcome } from './types';
