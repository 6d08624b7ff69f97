/**
 * Classifier barrel exports
 */

export {
  classifyDocument,
  createClassifier,
  buildTextBlob,
} from "./classifier";
