/**
 * Document sources barrel exports
 */

export {
  JsonFileDocumentSource,
  DocumentSourceError,
  parseDocumentRecord,
} from "./jsonFileDocumentSource";
