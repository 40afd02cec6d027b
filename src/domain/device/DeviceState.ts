export const DeviceState = {
  OFF: 0,
  ON: 1,
} as const;

export type DeviceState = (typeof DeviceState)[keyof typeof DeviceState];

export function fromSwitch(on: boolean): DeviceState {
  return on ? DeviceState.ON : DeviceState.OFF;
}

export function toSwitch(state: DeviceState): boolean {
  return state === DeviceState.ON;
}

export function complement(state: DeviceState): DeviceState {
  return state === DeviceState.ON ? DeviceState.OFF : DeviceState.ON;
}
