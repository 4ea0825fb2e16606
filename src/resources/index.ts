// ═══════════════════════════════════════════════════════════════════════════════
// RESOURCES MODULE
// ═══════════════════════════════════════════════════════════════════════════════

export {
  MappingNotFoundError,
  MappingValidationError,
  CanonicalItemSchema,
  MappingRecordsSchema,
  MappingDocumentSchema,
  parseMappingRecords,
  FileMappingSource,
  StaticMappingSource,
  type MappingSource,
} from './mapping-source.js';
