/**
 * Report files and text digests.
 */

export {
  filterResultToWire,
  assessmentToWire,
  serializeReport,
  parsePipelineOutput,
  loadPipelineOutput,
  saveReports,
  CONTENT_FILTER_FILENAME,
  QUALITY_ASSESSMENT_FILENAME,
  type SavedReports,
} from "./serialization.js";
export { formatFilterResult, formatAssessment } from "./format.js";
