/**
 * Per-generation command byte tables.
 *
 * The CoolLED families share one command set as far as anyone has observed.
 * Several entries below are unproven guesses carried over from traffic
 * captures; they are kept as configured bytes, not as verified behaviour.
 */

/**
 * Logical actions that map to a one-byte command code, in table order.
 */
export const COMMAND_ACTIONS = [
  'music',
  'text',
  'image',
  'animation',
  'icon',
  'buttonOff',
  'mode',
  'speed',
  'brightness',
  'switch',
  'transfer',
  'invertDisplay',
  'clearMaybe',
  'showIcon',
  'powerDown',
  'buttonOn',
  'invertOrSomething',
  'requestSomething',
  'initialize',
] as const;

export type CommandAction = (typeof COMMAND_ACTIONS)[number];

export enum DeviceGeneration {
  COOLLEDX = 'CoolLEDX',
  COOLLEDM = 'CoolLEDM',
  COOLLEDU = 'CoolLEDU',
  COOLLEDMX = 'CoolLEDMX',
  COOLLEDUX = 'CoolLEDUX',
}

export interface HardwareProfile {
  readonly generation: DeviceGeneration;
  readonly commands: Readonly<Record<CommandAction, number>>;
}

const BASE_COMMANDS: Readonly<Record<CommandAction, number>> = Object.freeze({
  music: 0x01,
  text: 0x02,
  image: 0x03,
  animation: 0x04,
  icon: 0x05,
  // Unproven. Shares 0x05 with icon; a CoolLEDM sent it with 0x1F before text
  buttonOff: 0x05,
  mode: 0x06,
  speed: 0x07,
  brightness: 0x08,
  switch: 0x09,
  // Unproven
  transfer: 0x0a,
  // Works on CoolLEDM
  invertDisplay: 0x0c,
  // Seen on a CoolLEDM before text, followed by 28 28 28 28 28 28 28 00
  clearMaybe: 0x0d,
  // Unproven
  showIcon: 0x11,
  // Unproven
  powerDown: 0x12,
  // Unproven; supposedly turns the sign on and initializes it
  buttonOn: 0x13,
  // Unproven
  invertOrSomething: 0x15,
  // A CoolLEDM answered 01 ff 00 01 00
  requestSomething: 0x1f,
  initialize: 0x23,
});

const PROFILES: Readonly<Record<DeviceGeneration, HardwareProfile>> = Object.freeze({
  [DeviceGeneration.COOLLEDX]: { generation: DeviceGeneration.COOLLEDX, commands: BASE_COMMANDS },
  [DeviceGeneration.COOLLEDM]: { generation: DeviceGeneration.COOLLEDM, commands: BASE_COMMANDS },
  [DeviceGeneration.COOLLEDU]: { generation: DeviceGeneration.COOLLEDU, commands: BASE_COMMANDS },
  [DeviceGeneration.COOLLEDMX]: { generation: DeviceGeneration.COOLLEDMX, commands: BASE_COMMANDS },
  [DeviceGeneration.COOLLEDUX]: { generation: DeviceGeneration.COOLLEDUX, commands: BASE_COMMANDS },
});

export const DEFAULT_HARDWARE_PROFILE: HardwareProfile = PROFILES[DeviceGeneration.COOLLEDX];

export function hardwareProfile(generation: DeviceGeneration): HardwareProfile {
  return PROFILES[generation];
}

/**
 * Select the profile for an advertised device name.
 *
 * @param deviceName - Advertised local name, e.g. "CoolLEDM"
 * @returns Matching profile, or the CoolLEDX profile for unknown names
 */
export function resolveHardwareProfile(deviceName: string | undefined): HardwareProfile {
  const generation = Object.values(DeviceGeneration).find(
    (g) => g.toLowerCase() === deviceName?.trim().toLowerCase()
  );
  if (!generation) {
    console.warn(
      `Unknown device name "${deviceName ?? ''}", using ${DeviceGeneration.COOLLEDX} command set`
    );
    return DEFAULT_HARDWARE_PROFILE;
  }
  return PROFILES[generation];
}

/**
 * Reverse lookup used by the traffic decoder. Aliased bytes report the first
 * action in table order.
 */
export function actionForCommandByte(
  profile: HardwareProfile,
  commandByte: number
): CommandAction | undefined {
  return COMMAND_ACTIONS.find((action) => profile.commands[action] === commandByte);
}
