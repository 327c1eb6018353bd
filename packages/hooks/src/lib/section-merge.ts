import { SECTION_END_MARKER, SECTION_START_MARKER } from '@ruff-claude-hook/shared';

export interface SectionMarkers {
  start: string;
  end: string;
}

export const DEFAULT_MARKERS: SectionMarkers = {
  start: SECTION_START_MARKER,
  end: SECTION_END_MARKER,
};

/**
 * A document cut around its managed section. `before` ends with the start
 * marker and `after` begins with the end marker, so
 * `before + inside + after` is the original text.
 */
export interface SectionSlices {
  before: string;
  inside: string;
  after: string;
}

/**
 * Pairs the first end marker with the closest start marker before it, so a
 * stray start marker earlier in the text stays outside the section.
 * Returns null when no such pair exists.
 */
export function splitSection(text: string, markers: SectionMarkers = DEFAULT_MARKERS): SectionSlices | null {
  const endIdx = text.indexOf(markers.end);
  if (endIdx === -1) return null;

  const startIdx = text.lastIndexOf(markers.start, endIdx - markers.start.length);
  if (startIdx === -1 || endIdx - startIdx < markers.start.length) return null;

  const innerStart = startIdx + markers.start.length;
  return {
    before: text.slice(0, innerStart),
    inside: text.slice(innerStart, endIdx),
    after: text.slice(endIdx),
  };
}

/** Managed content of a template, trimmed. A template without markers is used whole. */
export function extractSectionContent(template: string, markers: SectionMarkers = DEFAULT_MARKERS): string {
  const slices = splitSection(template, markers);
  return slices ? slices.inside.trim() : template;
}

/**
 * Put the template's managed section into `existing`.
 *
 * With both markers present only the text between them is replaced; without
 * them a separator and a fresh section are appended. Running it again on its
 * own output yields the same text.
 */
export function mergeSection(existing: string, template: string, markers: SectionMarkers = DEFAULT_MARKERS): string {
  const content = extractSectionContent(template, markers);
  const slices = splitSection(existing, markers);

  if (slices) {
    return `${slices.before}\n\n${content}\n\n${slices.after}`;
  }

  return `${existing}\n\n---\n\n${markers.start}\n\n${content}\n\n${markers.end}\n`;
}
