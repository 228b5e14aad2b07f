import { OrchestratorStateError } from './errors';

// Progress of one orchestrated job; cleanup reads it to know what exists remotely
export type TranscodeStep = 'init' | 'input-sent' | 'transcoding-done' | 'output-downloaded';

const ORDER: Record<TranscodeStep, number> = {
  init: 0,
  'input-sent': 1,
  'transcoding-done': 2,
  'output-downloaded': 3,
};

export function stepIndex(step: TranscodeStep): number {
  return ORDER[step];
}

export function canDeleteInput(step: TranscodeStep): boolean {
  return ORDER[step] >= ORDER['input-sent'];
}

export function canDeleteOutput(step: TranscodeStep): boolean {
  return ORDER[step] >= ORDER['transcoding-done'];
}

export function isIdle(step: TranscodeStep): boolean {
  return step === 'init' || step === 'output-downloaded';
}

// Moves exactly one step forward. Going back to init is reset(), not advance().
export function advance(from: TranscodeStep, to: TranscodeStep): TranscodeStep {
  if (ORDER[to] !== ORDER[from] + 1) {
    throw new OrchestratorStateError(`Cannot move from step ${from} to ${to}`);
  }
  return to;
}

// Only cleanup goes back; whatever the run reached, the next one starts over
export function reset(): TranscodeStep {
  return 'init';
}
