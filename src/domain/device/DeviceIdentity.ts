export interface DeviceIdentity {
  readonly hostOrAddress: string;
  readonly deviceId: string;
  readonly deviceKey: string;
}

/** Builds a frozen identity; throws when any part is blank. */
export function createDeviceIdentity(
  hostOrAddress: string,
  deviceId: string,
  deviceKey: string
): DeviceIdentity {
  if (!hostOrAddress.trim()) throw new Error("Device host is required.");
  if (!deviceId) throw new Error("Device id is required.");
  if (!deviceKey) throw new Error("Device key is required.");
  return Object.freeze({ hostOrAddress, deviceId, deviceKey });
}
