export type MarkerPair = { readonly start: string; readonly end: string };

export type ScannerState =
  | { kind: 'outside' }
  | { kind: 'inside' }
  // buffer is a non-empty strict prefix of the awaited marker, held until the next fragment decides it
  | { kind: 'partial'; buffer: string; target: 'start' | 'end' };

export type SplitResult = { visible: string; reasoning: string };

export type Advance = { split: SplitResult; state: ScannerState };

export const OUTSIDE: ScannerState = { kind: 'outside' };
export const INSIDE: ScannerState = { kind: 'inside' };

export function markerPair(start: string, end: string): MarkerPair {
  if (!start || !end) throw new Error('Reasoning markers must not be empty');
  if (start === end) throw new Error(`Reasoning markers must differ (got "${start}" twice)`);
  return { start, end };
}

type Mode = 'outside' | 'inside';

function modeOf(state: ScannerState): Mode {
  switch (state.kind) {
    case 'outside':
    case 'inside':
      return state.kind;
    case 'partial':
      return state.target === 'start' ? 'outside' : 'inside';
  }
}

/**
 * Feeds one fragment of model text through the scanner.
 *
 * Outside a block only the start marker is looked for, inside only the end
 * marker, so a start marker inside a block is plain reasoning text. A held
 * partial marker is re-scanned together with the new fragment: if the
 * fragment refutes it, the held characters are emitted to the delta they
 * were withheld from.
 */
export function advance(state: ScannerState, input: string, markers: MarkerPair): Advance {
  let mode = modeOf(state);
  const text = state.kind === 'partial' ? state.buffer + input : input;
  const out: SplitResult = { visible: '', reasoning: '' };

  let runStart = 0;
  const emit = (until: number) => {
    if (until <= runStart) return;
    const run = text.slice(runStart, until);
    if (mode === 'outside') out.visible += run;
    else out.reasoning += run;
  };

  let i = 0;
  while (i < text.length) {
    const marker = mode === 'outside' ? markers.start : markers.end;
    if (text.startsWith(marker, i)) {
      emit(i);
      i += marker.length;
      runStart = i;
      mode = mode === 'outside' ? 'inside' : 'outside';
      continue;
    }
    const rest = text.length - i;
    if (rest < marker.length && marker.startsWith(text.slice(i))) {
      emit(i);
      return {
        split: out,
        state: { kind: 'partial', buffer: text.slice(i), target: mode === 'outside' ? 'start' : 'end' },
      };
    }
    i++;
  }
  emit(text.length);
  return { split: out, state: mode === 'outside' ? OUTSIDE : INSIDE };
}

// No more input will arrive: a held prefix is literal text of the block it was seen in.
export function flush(state: ScannerState): SplitResult {
  if (state.kind !== 'partial') return { visible: '', reasoning: '' };
  return state.target === 'start'
    ? { visible: state.buffer, reasoning: '' }
    : { visible: '', reasoning: state.buffer };
}

/** Splits a complete message text in one pass; equivalent to streaming it in any fragmentation. */
export function splitReasoning(text: string, markers: MarkerPair): SplitResult {
  const { split, state } = advance(OUTSIDE, text, markers);
  const rest = flush(state);
  return { visible: split.visible + rest.visible, reasoning: split.reasoning + rest.reasoning };
}
