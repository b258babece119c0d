import { SessionInteraction, SessionState } from '../types';
import { truncateString } from '../util';
import { MAX_INTERACTIONS } from './sessionStore';

const MAX_LISTED_VALUES = 50;

function summarizeValue(value: unknown): unknown {
  if (typeof value === 'string') return truncateString(value, 200);
  if (typeof value === 'number' || typeof value === 'boolean' || value === null) return value;
  if (Array.isArray(value)) {
    if (value.every((item): item is string => typeof item === 'string')) {
      return value.slice(0, MAX_LISTED_VALUES).map(item => truncateString(item, 200));
    }
    // Keep ids of returned objects so later turns can refer back to them
    const ids = value.map(item =>
      typeof item === 'object' && item !== null && 'id' in item && typeof item.id === 'string' ? item.id : undefined
    );
    if (ids.every((id): id is string => id !== undefined)) return ids.slice(0, MAX_LISTED_VALUES);
    return { count: value.length };
  }
  if (typeof value === 'object') {
    const entries = Object.entries(value).filter(([, v]) => typeof v !== 'object' || v === null);
    return Object.fromEntries(entries.map(([k, v]) => [k, summarizeValue(v)]));
  }
  return undefined;
}

/**
 * Compact view of a tool's output for the session log: scalars, ids of listed
 * objects, and counts for everything else.
 */
export function summarizeOutput(output: Record<string, unknown>): Record<string, unknown> {
  const summary: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(output)) {
    const summarized = summarizeValue(value);
    if (summarized !== undefined) summary[key] = summarized;
  }
  return summary;
}

export function appendInteraction(state: SessionState, interaction: SessionInteraction): SessionState {
  return {
    ...state,
    interactions: [...state.interactions, interaction].slice(-MAX_INTERACTIONS)
  };
}
