export {
  MappingError,
  DuplicateIdError,
  EmptyGlossaryError,
  InvalidAttributeError,
  GlossaryNotLoadedError,
  GlossarySourceError,
  ConfigError,
  wrapError,
  errorMessage,
} from './mapping-error.js';
export type { MappingErrorCode, MappingErrorDetails } from './mapping-error.js';
