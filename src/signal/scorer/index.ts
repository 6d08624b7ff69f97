/**
 * Scorer barrel exports
 */

export { scoreText, computeScore } from "./scorer";
