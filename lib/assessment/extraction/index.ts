export { createSnapshot, visibleText, type PageSnapshot } from "./page-text";
export { extract, extractAll } from "./field-extractor";
export {
  NUMBER_CAPTURE,
  label,
  labelledLine,
  labelledNumber,
  pattern,
  selector,
  type ExtractionStrategy,
  type FieldSpec,
  type FieldSpecTable,
} from "./field-spec";
