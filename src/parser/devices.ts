/**
 * applink-doctor — Parser for `adb devices -l`.
 *
 *   List of devices attached
 *   emulator-5554          device product:sdk_gphone64 model:sdk_gphone64 transport_id:1
 *   192.168.1.20:5555      device product:husky model:Pixel_8_Pro transport_id:2
 *   R5CT123456             unauthorized transport_id:3
 */

import type { ConnectionType, Device, DeviceState } from '../types/index.js';

function parseDeviceState(token: string | undefined): DeviceState {
  switch (token?.toLowerCase()) {
    case 'device': return 'online';
    case 'offline': return 'offline';
    case 'unauthorized': return 'unauthorized';
    default: return 'unknown';
  }
}

function detectConnection(serial: string): ConnectionType {
  if (serial.startsWith('emulator-')) return 'emulator';
  if (serial.includes(':')) return 'wifi';
  return 'usb';
}

export function parseDeviceList(output: string): Device[] {
  const devices: Device[] = [];

  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('List of devices') || trimmed.startsWith('*')) continue;

    const [serial, stateToken, ...rest] = trimmed.split(/\s+/);
    if (!serial) continue;

    const attrs = new Map<string, string>();
    for (const part of rest) {
      const idx = part.indexOf(':');
      if (idx > 0) attrs.set(part.slice(0, idx), part.slice(idx + 1));
    }

    devices.push({
      serial,
      state: parseDeviceState(stateToken),
      model: attrs.get('model') ?? 'Unknown',
      product: attrs.get('product'),
      connection: detectConnection(serial),
    });
  }

  return devices;
}
