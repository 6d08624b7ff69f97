/**
 * Digest module barrel exports
 */

export {
  renderDigest,
  renderDigestSubject,
  formatDigestDate,
} from "./renderDigest";
export { FileDigestSink, formatFileTimestamp } from "./fileDigestSink";
