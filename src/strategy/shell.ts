/**
 * applink-doctor — Values interpolated into device shell commands.
 *
 * Everything handed to `adb shell` is parsed by the device's sh, so caller
 * input is either checked against a strict grammar or single-quoted.
 */

/** Android application id: two or more dot-separated Java identifiers. */
export const APPLICATION_ID_PATTERN = /^[A-Za-z][A-Za-z0-9_]*(\.[A-Za-z][A-Za-z0-9_]*)+$/;

/** Intent action names such as android.intent.action.VIEW. */
export const INTENT_ACTION_PATTERN = /^[A-Za-z][A-Za-z0-9_]*(\.[A-Za-z0-9_]+)*$/;

/** URI with a scheme, e.g. https://example.com/item or myapp://open. */
export const URI_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*:\S+$/;

export function isApplicationId(value: string): boolean {
  return APPLICATION_ID_PATTERN.test(value);
}

/** Quote a value for POSIX sh; the result is always one word. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
