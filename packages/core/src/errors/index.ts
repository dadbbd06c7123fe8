export {
  TrackerError,
  TransportError,
  AuthorizationError,
  ParseError,
  ExtractionError,
  ArchiveSubmissionError,
  httpError,
  errorMessage,
} from "./catalog.js";
