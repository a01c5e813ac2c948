export { ExtractionMailbox } from './ExtractionMailbox';
export { ExtractionCoordinator } from './ExtractionCoordinator';
export { parseExtractionJson } from './parseExtractionJson';
export { ExtractionError, ExtractionErrorCode, toExtractionError } from './types';
export type {
  DocumentAnalysisService,
  ExtractionSource,
  SettledExtraction
} from './types';
