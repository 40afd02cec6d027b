import TuyAPI from "tuyapi";
import type { DeviceIdentity } from "../../domain/device/DeviceIdentity";
import type {
  DataPoints,
  OutletTransportFactory,
  OutletTransportPort,
  TransportFailure,
  TransportOptions,
  TransportRecord,
} from "../../ports/devices/OutletTransportPort";
import { silentLogger, type LoggerPort } from "../../ports/sys/LoggerPort";

export const TransportErrors = {
  json: { Err: "900", Error: "Invalid JSON Response from Device" },
  connect: { Err: "901", Error: "Network Error: Unable to Connect" },
  timeout: { Err: "902", Error: "Timeout Waiting for Device" },
  payload: { Err: "904", Error: "Unexpected Payload from Device" },
  offline: { Err: "905", Error: "Network Error: Device Unreachable" },
  keyOrVersion: { Err: "914", Error: "Check device key or version" },
} as const satisfies Record<string, TransportFailure>;

const UNREACHABLE_CODES = new Set(["ECONNREFUSED", "EHOSTUNREACH", "ENETUNREACH", "ENOTFOUND", "EAI_AGAIN"]);

export interface TuyaSessionOptions {
  id: string;
  key: string;
  ip: string;
  version: number;
  issueGetOnConnect: boolean;
}

/** The slice of a tuyapi device this transport drives. */
export interface TuyaSession {
  connect(): Promise<unknown>;
  disconnect(): void;
  get(options: { schema: boolean }): Promise<unknown>;
  set(options: { dps: number; set: boolean }): Promise<unknown>;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export type TuyaSessionFactory = (options: TuyaSessionOptions) => TuyaSession;

export const createTuyaSession: TuyaSessionFactory = (options) => new TuyAPI(options);

class AttemptTimeoutError extends Error {
  constructor(seconds: number) {
    super(`No response within ${seconds}s`);
    this.name = "AttemptTimeoutError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function errorCode(error: unknown): string | undefined {
  if (isRecord(error) && typeof error.code === "string") return error.code;
  return undefined;
}

export function classifyError(error: unknown): TransportFailure {
  if (error instanceof AttemptTimeoutError) return { ...TransportErrors.timeout };
  if (error instanceof SyntaxError) return { ...TransportErrors.json };
  const code = errorCode(error);
  if (code && UNREACHABLE_CODES.has(code)) return { ...TransportErrors.offline };
  const message = error instanceof Error ? error.message : String(error);
  if (/decrypt|local key|invalid key/i.test(message)) return { ...TransportErrors.keyOrVersion };
  return { ...TransportErrors.connect };
}

async function withTimeout<T>(run: () => Promise<T>, seconds: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new AttemptTimeoutError(seconds)), seconds * 1000);
  });
  try {
    return await Promise.race([run(), expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Talks to one outlet over the Tuya local protocol. Each call opens its own
 * session and makes up to `socketRetryLimit` attempts of at most
 * `socketTimeout` seconds; failures come back as error records, never throws.
 */
export class TuyaOutletTransport implements OutletTransportPort {
  constructor(
    private readonly identity: DeviceIdentity,
    private readonly options: TransportOptions,
    private readonly createSession: TuyaSessionFactory = createTuyaSession,
    private readonly log: LoggerPort = silentLogger
  ) {}

  status(): Promise<TransportRecord> {
    return this.request("status", async (session) => {
      const data = await session.get({ schema: true });
      if (!isRecord(data) || !isRecord(data.dps)) {
        return { ...TransportErrors.payload, Payload: data };
      }
      return { dps: data.dps };
    });
  }

  setStatus(on: boolean): Promise<TransportRecord> {
    return this.request("set_status", async (session) => {
      const data = await session.set({ dps: 1, set: on });
      const dps: DataPoints = isRecord(data) && isRecord(data.dps) ? data.dps : {};
      return { dps };
    });
  }

  private async request(
    label: string,
    op: (session: TuyaSession) => Promise<TransportRecord>
  ): Promise<TransportRecord> {
    const { hostOrAddress, deviceId, deviceKey } = this.identity;
    const attempts = Math.max(1, this.options.socketRetryLimit);
    let last: TransportFailure = { ...TransportErrors.connect };

    for (let attempt = 1; attempt <= attempts; attempt++) {
      let session: TuyaSession | null = null;
      try {
        const opened = this.createSession({
          id: deviceId,
          key: deviceKey,
          ip: hostOrAddress,
          version: this.options.protocolVersion,
          issueGetOnConnect: false,
        });
        session = opened;
        opened.on("error", (error) => {
          this.log.debug(`[tuya] socket error during ${label}`, { host: hostOrAddress, reason: error.message });
        });
        return await withTimeout(async () => {
          await opened.connect();
          return op(opened);
        }, this.options.socketTimeout);
      } catch (error) {
        last = classifyError(error);
        this.log.debug(`[tuya] ${label} attempt ${attempt}/${attempts} failed`, {
          host: hostOrAddress,
          code: last.Err,
          reason: error instanceof Error ? error.message : String(error),
        });
      } finally {
        session?.disconnect();
      }
    }

    this.log.debug(`[tuya] ${label} gave up after ${attempts} attempts`, { host: hostOrAddress, code: last.Err });
    return last;
  }
}

export function tuyaTransportFactory(
  log: LoggerPort = silentLogger,
  createSession: TuyaSessionFactory = createTuyaSession
): OutletTransportFactory {
  return (identity, options) => new TuyaOutletTransport(identity, options, createSession, log);
}
