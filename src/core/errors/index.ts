export { CrawlerError, ConfigError, MarketNotFoundError } from "./CrawlerError";
export { TransportError } from "./TransportError";
export type { TransportErrorKind } from "./TransportError";
export { CircuitOpenError } from "./CircuitOpenError";
export { ExtractionError } from "./ExtractionError";
export type { ExtractionErrorReason } from "./ExtractionError";
export { ExportError } from "./ExportError";
export type { ExportErrorReason } from "./ExportError";
