/**
 * Marker Vocabularies
 *
 * The lexer recognizes markers from a table, never from hardcoded strings.
 * Select one with BRIDGE_MARKERS (harmony | bracket).
 */

import type { MarkerDefinition, MarkerTable, ParameterizedMarker } from '../types';

/**
 * Harmony vocabulary, as emitted by gpt-oss models:
 * `<|start|>assistant<|channel|>commentary to=functions.x <|constrain|>json<|message|>{...}<|call|>`
 */
export const harmonyMarkers: MarkerTable = {
  name: 'harmony',
  markers: [
    { kind: 'start', text: '<|start|>' },
    { kind: 'channel', text: '<|channel|>' },
    { kind: 'contentType', text: '<|constrain|>' },
    { kind: 'message', text: '<|message|>' },
    { kind: 'end', text: '<|end|>' },
    { kind: 'end', text: '<|call|>' },
    { kind: 'end', text: '<|return|>' },
  ],
  maxArgumentLength: 0,
};

/**
 * Bracket vocabulary with inline arguments:
 * `<channel:commentary><to:write_file><message>{...}<end>`
 */
export const bracketMarkers: MarkerTable = {
  name: 'bracket',
  markers: [
    { kind: 'start', text: '<start>' },
    { kind: 'channel', open: '<channel:', close: '>' },
    { kind: 'recipient', open: '<to:', close: '>' },
    { kind: 'contentType', open: '<type:', close: '>' },
    { kind: 'message', text: '<message>' },
    { kind: 'end', text: '<end>' },
  ],
  maxArgumentLength: 128,
};

export const markerTables: Record<string, MarkerTable> = {
  harmony: harmonyMarkers,
  bracket: bracketMarkers,
};

/**
 * Resolve a marker table by name
 * @throws Error if the name is unknown
 */
export function getMarkerTable(name: string): MarkerTable {
  const table = markerTables[name.trim().toLowerCase()];
  if (!table) {
    throw new Error(
      `Unknown marker vocabulary "${name}" (expected one of: ${Object.keys(markerTables).join(', ')})`
    );
  }
  return table;
}

export function isParameterized(marker: MarkerDefinition): marker is ParameterizedMarker {
  return 'open' in marker;
}

/**
 * Check a table for empty or duplicated spellings
 * @throws Error describing the first problem found
 */
export function validateMarkerTable(table: MarkerTable): void {
  if (table.markers.length === 0) {
    throw new Error(`Marker table "${table.name}" is empty`);
  }

  const seen = new Set<string>();
  for (const marker of table.markers) {
    const spelling = isParameterized(marker) ? marker.open : marker.text;
    if (!spelling) {
      throw new Error(`Marker table "${table.name}" has an empty ${marker.kind} marker`);
    }
    if (isParameterized(marker) && !marker.close) {
      throw new Error(`Marker table "${table.name}": ${marker.kind} marker has no close text`);
    }
    if (seen.has(spelling)) {
      throw new Error(`Marker table "${table.name}" repeats "${spelling}"`);
    }
    seen.add(spelling);
  }

  const hasArguments = table.markers.some(isParameterized);
  if (hasArguments && table.maxArgumentLength < 1) {
    throw new Error(`Marker table "${table.name}" needs a positive maxArgumentLength`);
  }
}
