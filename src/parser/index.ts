/**
 * applink-doctor — Device output parsers, public API.
 */

import type { AppLinkProfile, OsGeneration } from '../types/index.js';
import { parseGetAppLinks } from './get-app-links.js';
import { parseDumpsys } from './dumpsys.js';

export { parseGetAppLinks, parseModernState } from './get-app-links.js';
export { parseDumpsys, parseLegacyStatus } from './dumpsys.js';
export { parseDeviceList } from './devices.js';
export { parseLogcatLine } from './logcat.js';

export type AppLinksParser = (output: string) => AppLinkProfile[];

/** Parser matching the command set chosen for the given OS generation. */
export function parserFor(generation: OsGeneration): AppLinksParser {
  return generation === 'modern' ? parseGetAppLinks : parseDumpsys;
}
