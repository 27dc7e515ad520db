import { describe, expect, it } from 'vitest';
import { createThinkMarkerTracker, partialMarkerLength } from './thinkMarker';

describe('partialMarkerLength', () => {
  it('measures the open-marker prefix a text ends with', () => {
    expect(partialMarkerLength('abc<th', '<think>')).toBe(3);
    expect(partialMarkerLength('<think', '<think>')).toBe(6);
    expect(partialMarkerLength('abc', '<think>')).toBe(0);
    expect(partialMarkerLength('', '<think>')).toBe(0);
  });
});

describe('createThinkMarkerTracker', () => {
  it('passes plain text through as content', () => {
    const tracker = createThinkMarkerTracker();
    expect(tracker.classify('Hello')).toEqual([{ kind: 'content', text: 'Hello' }]);
    expect(tracker.insideMarker).toBe(false);
  });

  it('closes a region opened and closed in the same delta', () => {
    const tracker = createThinkMarkerTracker();
    expect(tracker.classify('<think>short</think>')).toEqual([
      { kind: 'reasoning', text: '<think>short</think>' },
      { kind: 'content', text: '' },
    ]);
    expect(tracker.insideMarker).toBe(false);
    expect(tracker.classify('after')).toEqual([{ kind: 'content', text: 'after' }]);
  });

  it('tracks region state across deltas', () => {
    const tracker = createThinkMarkerTracker();
    tracker.classify('<think>');
    expect(tracker.insideMarker).toBe(true);
    expect(tracker.classify('</think>')).toEqual([
      { kind: 'reasoning', text: '</think>' },
      { kind: 'content', text: '' },
    ]);
    expect(tracker.insideMarker).toBe(false);
  });

  it('supports custom markers', () => {
    const tracker = createThinkMarkerTracker({ open: '[[', close: ']]' });
    expect(tracker.classify('[[a')).toEqual([{ kind: 'reasoning', text: '[[a' }]);
    expect(tracker.classify(']')).toEqual([{ kind: 'reasoning', text: ']' }]);
    expect(tracker.classify(']')).toEqual([
      { kind: 'reasoning', text: ']' },
      { kind: 'content', text: '' },
    ]);
  });

  it('flushes nothing when no fragment is held', () => {
    const tracker = createThinkMarkerTracker();
    tracker.classify('plain');
    expect(tracker.flush()).toEqual([]);
  });
});
