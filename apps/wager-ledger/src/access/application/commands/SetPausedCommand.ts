import { Identity } from '@shared/kernel/Identity';

export interface SetPausedCommand {
  caller: Identity;
  paused: boolean;
}
