/**
 * Capability bits a session's client may support.
 */
export const Capability = {
  CanSeek: 1 << 0,
  CanPause: 1 << 1,
  CanSetVolume: 1 << 2,
  CanSkipNext: 1 << 3,
  CanSkipPrevious: 1 << 4,
  CanStop: 1 << 5,
  CanMute: 1 << 6,
} as const;

export type CapabilityName = keyof typeof Capability;

const CAPABILITY_NAMES: readonly CapabilityName[] = [
  'CanSeek',
  'CanPause',
  'CanSetVolume',
  'CanSkipNext',
  'CanSkipPrevious',
  'CanStop',
  'CanMute',
];

const PLAYSTATE_BITS =
  Capability.CanPause |
  Capability.CanStop |
  Capability.CanSeek |
  Capability.CanSkipNext |
  Capability.CanSkipPrevious;

/**
 * Recognized Jellyfin command names and the bits they grant.
 */
const COMMAND_CAPABILITIES: ReadonlyMap<string, number> = new Map([
  ['PlayState', PLAYSTATE_BITS],
  ['PlayPause', Capability.CanPause],
  ['Pause', Capability.CanPause],
  ['Unpause', Capability.CanPause],
  ['Stop', Capability.CanStop],
  ['Seek', Capability.CanSeek],
  ['NextTrack', Capability.CanSkipNext],
  ['PreviousTrack', Capability.CanSkipPrevious],
  ['SetVolume', Capability.CanSetVolume],
  ['VolumeUp', Capability.CanSetVolume],
  ['VolumeDown', Capability.CanSetVolume],
  ['Mute', Capability.CanMute],
  ['Unmute', Capability.CanMute],
  ['ToggleMute', Capability.CanMute],
]);

/**
 * Intersect a session's supported command names with the lookup table.
 * Unknown names contribute nothing.
 */
export function computeCapabilityMask(supportedCommands: Iterable<string>): number {
  let mask = 0;
  for (const name of supportedCommands) {
    mask |= COMMAND_CAPABILITIES.get(name) ?? 0;
  }
  return mask;
}

export function hasCapability(mask: number, capability: CapabilityName): boolean {
  return (mask & Capability[capability]) !== 0;
}

/**
 * Capability names set in a mask, in declaration order.
 */
export function listCapabilities(mask: number): CapabilityName[] {
  return CAPABILITY_NAMES.filter((name) => hasCapability(mask, name));
}
