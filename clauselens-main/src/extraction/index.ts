export { extractContractFields } from "./field-extractor.js";
export type { ContractFields, ExtractedField } from "./field-extractor.js";
export { findAmount, findDate, findDates } from "./normalizers.js";
export type { DateMatch, TextMatch } from "./normalizers.js";
