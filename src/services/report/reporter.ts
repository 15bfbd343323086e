// Terminal report for a validation run

import { Chalk, type ChalkInstance } from 'chalk';
import type { ResolutionError } from '../../core/errors.js';
import type { ColorMode } from '../../core/schemas.js';
import type { LineStyle, ReportLine, ReportSubject, ValidationOutcome } from '../../models/types.js';

export const FAULTY_FILE_MESSAGE = 'Faulty XML or XSD file was given.\n';
export const UNEXPECTED_ERROR_MESSAGE =
  '\nValidation ran into an unexpected error. Run command with --verbose option for more details\n';

function subjectLines(subject: ReportSubject): ReportLine[] {
  return subject.kind === 'url'
    ? [{ text: `The XML from the URL:\n${subject.url}` }]
    : [{ text: `The XML file: ${subject.name}` }];
}

/**
 * Lines printed for a finished validation run
 */
export function formatReport(outcome: ValidationOutcome, subject: ReportSubject, verbose: boolean): ReportLine[] {
  switch (outcome.status) {
    case 'valid':
      return [...subjectLines(subject), { text: 'is valid.\n', style: 'success' }];

    case 'invalid': {
      const lines: ReportLine[] = [...subjectLines(subject), { text: 'is invalid.\n', style: 'failure' }];
      if (verbose) {
        lines.push({ text: 'Error:', style: 'emphasis' }, { text: outcome.detail });
      }
      return lines;
    }

    case 'malformed':
      return verbose
        ? [{ text: FAULTY_FILE_MESSAGE }, { text: `Error: ${outcome.detail}` }]
        : [{ text: FAULTY_FILE_MESSAGE }];

    case 'error':
      return verbose
        ? [{ text: `Error: ${outcome.detail}` }]
        : [{ text: UNEXPECTED_ERROR_MESSAGE }];
  }
}

/**
 * Lines printed when an argument could not be resolved
 */
export function formatResolutionError(error: ResolutionError): ReportLine[] {
  return [{ text: error.message }];
}

/**
 * Chalk instance for a colour mode; 'auto' keeps chalk's terminal detection
 */
export function createPalette(mode: ColorMode, detected: ChalkInstance['level']): ChalkInstance {
  switch (mode) {
    case 'always':
      return new Chalk({ level: detected > 0 ? detected : 1 });
    case 'never':
      return new Chalk({ level: 0 });
    case 'auto':
      return new Chalk({ level: detected });
  }
}

function applyStyle(palette: ChalkInstance, style: LineStyle | undefined, text: string): string {
  switch (style) {
    case 'success':
      return palette.green(text);
    case 'failure':
      return palette.red(text);
    case 'emphasis':
      return palette.bold(text);
    default:
      return text;
  }
}

/**
 * Render lines to text, each followed by a newline
 */
export function renderLines(lines: ReportLine[], palette: ChalkInstance): string {
  return lines.map(line => `${applyStyle(palette, line.style, line.text)}\n`).join('');
}
