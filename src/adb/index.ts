/**
 * applink-doctor — Device channel over adb.
 */

export { AdbError, AdbExecutor } from './executor.js';
export type { AdbErrorKind, DeviceChannel, RunOptions } from './executor.js';
