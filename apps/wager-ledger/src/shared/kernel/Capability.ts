export enum Capability {
  GAME_MANAGER = 'GAME_MANAGER',
  MINTER = 'MINTER',
}

export const ALL_CAPABILITIES: readonly Capability[] = [
  Capability.GAME_MANAGER,
  Capability.MINTER,
];
