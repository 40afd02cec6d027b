import type { DeviceIdentity } from "../../domain/device/DeviceIdentity";

export type DataPoints = Record<string, unknown>;

export interface TransportStatus {
  dps: DataPoints;
}

/** Error indicator as reported by the local protocol: `Err` is a numeric code string. */
export interface TransportFailure {
  Err: string;
  Error: string;
  Payload?: unknown;
}

export type TransportRecord = TransportStatus | TransportFailure;

export interface TransportOptions {
  protocolVersion: number;
  socketRetryLimit: number;
  /** Seconds allowed for each attempt. */
  socketTimeout: number;
}

export const DEFAULT_TRANSPORT_OPTIONS: TransportOptions = {
  protocolVersion: 3.3,
  socketRetryLimit: 4,
  socketTimeout: 4,
};

export interface OutletTransportPort {
  status(): Promise<TransportRecord>;
  setStatus(on: boolean): Promise<TransportRecord>;
}

export type OutletTransportFactory = (
  identity: DeviceIdentity,
  options: TransportOptions
) => OutletTransportPort;

export function isTransportFailure(record: TransportRecord): record is TransportFailure {
  return "Error" in record;
}
