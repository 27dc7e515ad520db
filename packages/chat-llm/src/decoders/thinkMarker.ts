import { THINK_CLOSE_MARKER, THINK_OPEN_MARKER, type ReasoningEvent } from '@reasoning-relay/chat-contract';

export type ThinkMarkers = {
  open: string;
  close: string;
};

export type ThinkMarkerTracker = {
  readonly insideMarker: boolean;
  /**
   * Classifies one content delta. Markers stay in the reasoning text. Closing
   * a region appends an empty `content` event. A trailing fragment that could
   * start an open marker is held back and prefixed to the next delta.
   */
  classify(text: string): ReasoningEvent[];
  /** Releases a held-back fragment as content at stream end. */
  flush(): ReasoningEvent[];
};

const DEFAULT_MARKERS: ThinkMarkers = { open: THINK_OPEN_MARKER, close: THINK_CLOSE_MARKER };

/** Length of the longest proper prefix of `marker` that `text` ends with. */
export function partialMarkerLength(text: string, marker: string): number {
  for (let length = Math.min(marker.length - 1, text.length); length > 0; length -= 1) {
    if (text.endsWith(marker.slice(0, length))) {
      return length;
    }
  }
  return 0;
}

export function createThinkMarkerTracker(markers: ThinkMarkers = DEFAULT_MARKERS): ThinkMarkerTracker {
  let insideMarker = false;
  // Outside a region: text that may be the start of an open marker.
  let pending = '';
  // Inside a region: tail of the reasoning so far, so a split close marker is still found.
  let carry = '';
  const carryLength = markers.close.length - 1;

  const keepTail = (text: string) => (carryLength > 0 ? text.slice(-carryLength) : '');

  const closeRegion = (text: string): ReasoningEvent[] => {
    insideMarker = false;
    carry = '';
    return [
      { kind: 'reasoning', text },
      { kind: 'content', text: '' },
    ];
  };

  return {
    get insideMarker() {
      return insideMarker;
    },
    classify(text) {
      if (insideMarker) {
        const window = carry + text;
        if (window.includes(markers.close)) {
          return closeRegion(text);
        }
        carry = keepTail(window);
        return [{ kind: 'reasoning', text }];
      }

      const buffered = pending + text;
      pending = '';
      const openAt = buffered.indexOf(markers.open);
      if (openAt === -1) {
        const held = partialMarkerLength(buffered, markers.open);
        pending = buffered.slice(buffered.length - held);
        const emitted = buffered.slice(0, buffered.length - held);
        return emitted ? [{ kind: 'content', text: emitted }] : [];
      }

      insideMarker = true;
      const afterOpen = buffered.slice(openAt + markers.open.length);
      if (afterOpen.includes(markers.close)) {
        return closeRegion(buffered);
      }
      carry = keepTail(afterOpen);
      return [{ kind: 'reasoning', text: buffered }];
    },
    flush() {
      if (!pending) {
        return [];
      }
      const text = pending;
      pending = '';
      return [{ kind: 'content', text }];
    },
  };
}
