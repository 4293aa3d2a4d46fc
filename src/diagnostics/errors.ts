/**
 * applink-doctor — Run-global diagnostic failures.
 */

export type DiagnosticsErrorKind =
  | 'SdkLevelUnparseable'
  | 'DeviceCommandFailed'
  | 'PackageNotFound'
  | 'Cancelled'
  | 'InvalidArgument';

export class DiagnosticsError extends Error {
  constructor(
    readonly kind: DiagnosticsErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DiagnosticsError';
  }

  static sdkLevelUnparseable(raw: string): DiagnosticsError {
    return new DiagnosticsError('SdkLevelUnparseable', `Could not parse SDK level from device output: "${raw.trim()}"`);
  }

  static commandFailed(command: string, cause: Error): DiagnosticsError {
    return new DiagnosticsError('DeviceCommandFailed', `Device command failed (${command}): ${cause.message}`, { cause });
  }

  static packageNotFound(packageName: string): DiagnosticsError {
    return new DiagnosticsError('PackageNotFound', `Package ${packageName} has no app links on this device`);
  }

  static invalidPackageName(packageName: string): DiagnosticsError {
    return new DiagnosticsError('InvalidArgument', `Invalid application id: "${packageName}"`);
  }

  static invalidArgument(message: string): DiagnosticsError {
    return new DiagnosticsError('InvalidArgument', message);
  }

  static cancelled(): DiagnosticsError {
    return new DiagnosticsError('Cancelled', 'Diagnostics run was cancelled');
  }
}
