import type { DeviceIdentity } from "../domain/device/DeviceIdentity";
import { DeviceState, complement, fromSwitch, toSwitch } from "../domain/device/DeviceState";
import {
  DEFAULT_TRANSPORT_OPTIONS,
  isTransportFailure,
  type OutletTransportFactory,
  type OutletTransportPort,
  type TransportOptions,
  type TransportFailure,
} from "../ports/devices/OutletTransportPort";
import { silentLogger, type LoggerPort } from "../ports/sys/LoggerPort";
import { deviceError, type DeviceError } from "../shared/errors";
import { err, ok, type Result } from "../shared/result";

/** Data point holding the primary outlet switch. */
export const SWITCH_DPS = "1";

export const ERR_PAYLOAD = "904";

export interface DeviceControllerOptions {
  transport?: Partial<TransportOptions>;
  logger?: LoggerPort;
}

/**
 * On/off/toggle interface over one outlet. Every call goes to the device; the
 * controller keeps no believed state of its own, so a failed read or write
 * changes nothing here and only surfaces as a `DeviceError`.
 */
export class DeviceController {
  private readonly transport: OutletTransportPort;
  private readonly log: LoggerPort;

  constructor(
    readonly identity: DeviceIdentity,
    createTransport: OutletTransportFactory,
    options: DeviceControllerOptions = {}
  ) {
    this.log = options.logger ?? silentLogger;
    this.transport = createTransport(identity, {
      ...DEFAULT_TRANSPORT_OPTIONS,
      ...options.transport,
    });
  }

  async getState(): Promise<Result<DeviceState, DeviceError>> {
    const record = await this.transport.status();
    if (isTransportFailure(record)) return err(this.toDeviceError(record));

    const value = record.dps[SWITCH_DPS];
    if (typeof value !== "boolean") {
      this.log.debug("Status record has no switch data point", { dps: record.dps });
      return err(deviceError(ERR_PAYLOAD, "Unexpected Payload from Device"));
    }
    return ok(fromSwitch(value));
  }

  async setState(target: DeviceState): Promise<Result<void, DeviceError>> {
    const record = await this.transport.setStatus(toSwitch(target));
    if (isTransportFailure(record)) return err(this.toDeviceError(record));
    return ok(undefined);
  }

  turnOn(): Promise<Result<void, DeviceError>> {
    return this.setState(DeviceState.ON);
  }

  turnOff(): Promise<Result<void, DeviceError>> {
    return this.setState(DeviceState.OFF);
  }

  /**
   * Reads the current state and writes its complement. Not atomic: anything that
   * switches the outlet between the two round-trips is overwritten with the
   * complement of the stale read.
   */
  async toggle(): Promise<Result<DeviceState, DeviceError>> {
    const current = await this.getState();
    if (!current.ok) return current;

    const next = complement(current.value);
    const written = await this.setState(next);
    if (!written.ok) return written;
    return ok(next);
  }

  private toDeviceError(record: TransportFailure): DeviceError {
    this.log.debug("Transport reported an error", {
      host: this.identity.hostOrAddress,
      code: record.Err,
    });
    return deviceError(record.Err, record.Error);
  }
}
