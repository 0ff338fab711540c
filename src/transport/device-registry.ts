/**
 * Per-transport registry of known devices, keyed by normalized device ID.
 *
 * @module
 */

/** Canonical form used as a registry key: trimmed, upper-case. */
export function normalizeDeviceId(deviceId: string): string {
  return deviceId.trim().toUpperCase();
}

export interface DeviceRecord {
  /** Normalized device ID. */
  readonly deviceId: string;
  /** Last-known transport-specific address (IP:port, MAC, relay URL...). */
  readonly address?: string;
  readonly metadata: Readonly<Record<string, unknown>>;
  /** Unix timestamp in milliseconds. */
  readonly lastSeen: number;
}

export interface DeviceRegistration {
  readonly address?: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export class DeviceRegistry {
  private readonly devices = new Map<string, DeviceRecord>();

  /**
   * Insert or refresh a device. Metadata is merged over what was known; an
   * omitted address keeps the previous one.
   */
  register(deviceId: string, registration: DeviceRegistration = {}, now: number = Date.now()): DeviceRecord {
    const key = normalizeDeviceId(deviceId);
    const previous = this.devices.get(key);
    const record: DeviceRecord = {
      deviceId: key,
      address: registration.address ?? previous?.address,
      metadata: { ...previous?.metadata, ...registration.metadata },
      lastSeen: now,
    };
    this.devices.set(key, record);
    return record;
  }

  get(deviceId: string): DeviceRecord | undefined {
    return this.devices.get(normalizeDeviceId(deviceId));
  }

  has(deviceId: string): boolean {
    return this.devices.has(normalizeDeviceId(deviceId));
  }

  remove(deviceId: string): boolean {
    return this.devices.delete(normalizeDeviceId(deviceId));
  }

  list(): DeviceRecord[] {
    return [...this.devices.values()];
  }

  get size(): number {
    return this.devices.size;
  }

  /** Drop devices not seen within `maxAgeMs`. Returns the removed IDs. */
  pruneOlderThan(maxAgeMs: number, now: number = Date.now()): string[] {
    const removed: string[] = [];
    for (const [key, record] of this.devices) {
      if (now - record.lastSeen > maxAgeMs) {
        this.devices.delete(key);
        removed.push(key);
      }
    }
    return removed;
  }

  clear(): void {
    this.devices.clear();
  }
}
