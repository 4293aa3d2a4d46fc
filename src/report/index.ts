/**
 * applink-doctor — Report rendering, exports.
 * Pure string builders; callers decide where output goes.
 */

export {
  C,
  comparisonText,
  formatDevices,
  formatIssue,
  formatLogEntry,
  formatProfiles,
  formatReport,
  formatTable,
  formatValidation,
  stateText,
  stripAnsi,
  trunc,
  trustStatusText,
  type Column,
} from './format.js';
export { formatReportMarkdown } from './markdown.js';
