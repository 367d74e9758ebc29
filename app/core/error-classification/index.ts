export { ErrorClassificationService } from './error-classification.service';
export type {
  ErrorClassificationResult,
  ErrorClassificationHints,
  ErrorPatternConfiguration
} from './error-classification.service';
