/**
 * iCalendar (RFC 5545) text parser.
 *
 * Only VEVENT components are extracted. Calendar-level properties and other
 * components are skipped, and per-event problems are reported as
 * diagnostics instead of failing the whole document.
 */

import type { Calendar, CalendarEvent, ContentLine, EventTime, ParseDiagnostic, ParseOptions } from '../types/calendar.js';
import { isSupportedTimeZone, parseICalDateTime } from './timezone.js';

const EVENT_COMPONENT = 'VEVENT';

type TextField = 'uid' | 'summary' | 'location' | 'description' | 'url';

const TEXT_PROPERTIES = new Map<string, TextField>([
  ['UID', 'uid'],
  ['SUMMARY', 'summary'],
  ['LOCATION', 'location'],
  ['DESCRIPTION', 'description'],
  ['URL', 'url']
]);

interface EventDraft {
  openedAt: number;
  fields: Pick<CalendarEvent, TextField>;
  dtstart?: ContentLine;
  dtend?: ContentLine;
}

type ParserState =
  | { kind: 'outside' }
  | { kind: 'inside'; draft: EventDraft; nestedDepth: number };

/**
 * Joins folded continuation lines. A physical line starting with a space or
 * tab continues the previous logical line; only that one character is dropped.
 */
export function unfoldLines(text: string): string[] {
  const unfolded: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    if ((line.startsWith(' ') || line.startsWith('\t')) && unfolded.length > 0) {
      unfolded[unfolded.length - 1] += line.substring(1);
    } else {
      unfolded.push(line);
    }
  }

  return unfolded;
}

/**
 * Splits a logical line into name, parameters and unescaped value.
 * Returns null when the line has no unquoted colon.
 */
export function parseContentLine(line: string): ContentLine | null {
  let inQuotes = false;
  let colonIdx = -1;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') {
      inQuotes = !inQuotes;
    } else if (ch === ':' && !inQuotes) {
      colonIdx = i;
      break;
    }
  }

  if (colonIdx <= 0) return null;

  const segments = splitUnquoted(line.substring(0, colonIdx), ';');
  const name = segments[0].trim().toUpperCase();
  if (!name) return null;

  const params = new Map<string, string>();
  for (const segment of segments.slice(1)) {
    const eqIdx = segment.indexOf('=');
    if (eqIdx === -1) continue;
    params.set(segment.substring(0, eqIdx).trim().toUpperCase(), unquote(segment.substring(eqIdx + 1)));
  }

  return { name, params, value: unescapeText(line.substring(colonIdx + 1)) };
}

/**
 * Decodes TEXT escapes: \\ \; \, \n \N
 */
export function unescapeText(value: string): string {
  return value.replace(/\\([\\;,nN])/g, (_match, ch: string) => (ch === 'n' || ch === 'N' ? '\n' : ch));
}

/**
 * Parses a calendar document into its events. Never throws.
 */
export function parseCalendar(text: string, options: ParseOptions = {}): Calendar {
  const events: CalendarEvent[] = [];
  const diagnostics: ParseDiagnostic[] = [];

  let floatingTimeZone = options.floatingTimeZone;
  if (floatingTimeZone && !isSupportedTimeZone(floatingTimeZone)) {
    diagnostics.push({ line: 0, message: `Floating timezone ${floatingTimeZone} not supported, using local time` });
    floatingTimeZone = undefined;
  }

  const finish = (draft: EventDraft, line: number, implicit: boolean): void => {
    const event = buildEvent(draft, floatingTimeZone, diagnostics);
    if (implicit) {
      diagnostics.push({ line, message: 'Event closed without END:VEVENT', uid: event.uid });
    }
    events.push(Object.freeze(event));
  };

  let state: ParserState = { kind: 'outside' };
  const lines = unfoldLines(text);

  for (const [index, raw] of lines.entries()) {
    const lineNo = index + 1;
    if (raw.trim() === '') continue;

    const property = parseContentLine(raw);
    if (!property) continue;

    const marker = property.name === 'BEGIN' || property.name === 'END'
      ? property.value.trim().toUpperCase()
      : undefined;

    switch (state.kind) {
      case 'outside':
        if (property.name === 'BEGIN' && marker === EVENT_COMPONENT) {
          state = { kind: 'inside', draft: { openedAt: lineNo, fields: {} }, nestedDepth: 0 };
        } else if (property.name === 'END' && marker === EVENT_COMPONENT) {
          diagnostics.push({ line: lineNo, message: 'END:VEVENT without matching BEGIN:VEVENT ignored' });
        }
        continue;

      case 'inside':
        if (property.name === 'BEGIN') {
          if (marker === EVENT_COMPONENT) {
            finish(state.draft, lineNo, true);
            state = { kind: 'inside', draft: { openedAt: lineNo, fields: {} }, nestedDepth: 0 };
          } else {
            state.nestedDepth++;
          }
          continue;
        }

        if (property.name === 'END') {
          if (marker === EVENT_COMPONENT) {
            finish(state.draft, lineNo, false);
            state = { kind: 'outside' };
          } else if (state.nestedDepth > 0) {
            state.nestedDepth--;
          }
          continue;
        }

        if (state.nestedDepth === 0) {
          applyProperty(state.draft, property);
        }
        continue;
    }
  }

  if (state.kind === 'inside') {
    finish(state.draft, lines.length, true);
  }

  return Object.freeze({
    events: Object.freeze(events),
    diagnostics: Object.freeze(diagnostics.map(d => Object.freeze(d)))
  });
}

function applyProperty(draft: EventDraft, property: ContentLine): void {
  if (property.name === 'DTSTART') {
    draft.dtstart = property;
    return;
  }
  if (property.name === 'DTEND') {
    draft.dtend = property;
    return;
  }

  const field = TEXT_PROPERTIES.get(property.name);
  if (field) {
    draft.fields[field] = property.value;
  }
}

function buildEvent(draft: EventDraft, floatingTimeZone: string | undefined, diagnostics: ParseDiagnostic[]): CalendarEvent {
  const event: CalendarEvent = { ...draft.fields };

  const report = (message: string): void => {
    diagnostics.push({ line: draft.openedAt, message, uid: event.uid });
  };

  if (!draft.dtstart) {
    report('Event has no DTSTART');
  } else {
    try {
      event.start = readTime(draft.dtstart, floatingTimeZone, report);
    } catch (error) {
      report(`Unparseable DTSTART: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  if (draft.dtend) {
    try {
      event.end = readTime(draft.dtend, floatingTimeZone, report);
    } catch (error) {
      report(`Unparseable DTEND: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  return event;
}

function readTime(property: ContentLine, floatingTimeZone: string | undefined, onWarning: (message: string) => void): EventTime {
  return Object.freeze(parseICalDateTime(property.value.trim(), {
    tzid: property.params.get('TZID'),
    floatingTimeZone,
    onWarning
  }));
}

function splitUnquoted(input: string, separator: string): string[] {
  const parts: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const ch of input) {
    if (ch === '"') {
      inQuotes = !inQuotes;
      current += ch;
    } else if (ch === separator && !inQuotes) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);

  return parts;
}

function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.substring(1, trimmed.length - 1);
  }
  return trimmed;
}
