/**
 * Ground truth text rendering
 *
 * The rendered text is what gets word-counted, shown to the model, and
 * checked verbatim after compaction, so every section renders through here.
 */

import type {
  ChangelogEntry,
  DocumentSections,
  GroundTruthDocument,
  PersonId,
  Proposer,
} from '../schemas/models.js';

export const DOCUMENT_TITLE = '# Project Ground Truth';
export const OBJECTIVE_HEADING = '## Core Objective';
export const DIRECTORY_HEADING = '## Directory & Responsibilities';
export const DECISION_LOG_HEADING = '## AI Decision Log';

const OBJECTIVE_PLACEHOLDER = 'Not yet defined.';

const ENTRY_PATTERN = /^\*\s+\*\*(\d{4}-\d{2}-\d{2}):\*\*\s+(.*)$/;
const ENTRY_SUFFIX_PATTERN = /^(.*?)(?: \((.*)\))? — proposed by (\S+?)(?:, approved by (\S+))?$/;

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function mention(personId: PersonId): string {
  return `<@${personId}>`;
}

function proposerLabel(proposer: Proposer): string {
  return proposer === 'bot' ? 'bot' : mention(proposer);
}

export function renderObjective(sections: DocumentSections): string {
  return sections.coreObjective.trim() || OBJECTIVE_PLACEHOLDER;
}

export function renderDirectoryLine(personId: PersonId, area: string): string {
  return `* ${mention(personId)} — ${area}`;
}

export function renderChangelogLine(entry: ChangelogEntry): string {
  const date = entry.timestamp.slice(0, 10);
  const reason = entry.reason ? ` (${entry.reason})` : '';
  const approval = entry.approvedBy ? `, approved by ${mention(entry.approvedBy)}` : '';
  return `* **${date}:** ${entry.description}${reason} — proposed by ${proposerLabel(entry.proposer)}${approval}`;
}

export function renderSections(sections: DocumentSections): string {
  const lines: string[] = [
    DOCUMENT_TITLE,
    '',
    OBJECTIVE_HEADING,
    renderObjective(sections),
    '',
    DIRECTORY_HEADING,
  ];

  for (const [personId, area] of Object.entries(sections.directory)) {
    lines.push(renderDirectoryLine(personId, area));
  }

  lines.push('', DECISION_LOG_HEADING);
  for (const entry of sections.decisionLog) {
    lines.push(renderChangelogLine(entry));
  }

  return lines.join('\n');
}

export function renderDocument(document: GroundTruthDocument): string {
  return renderSections(document.sections);
}

/**
 * Bullet lines under the decision log heading, up to the next heading.
 * Returns null when the heading is missing.
 */
export function extractDecisionLogLines(text: string): string[] | null {
  const lines = text.split(/\r?\n/);
  const start = lines.findIndex(line => line.trim() === DECISION_LOG_HEADING);
  if (start === -1) return null;

  const bullets: string[] = [];
  for (const line of lines.slice(start + 1)) {
    const trimmed = line.trim();
    if (trimmed.startsWith('#')) break;
    if (trimmed.startsWith('* ') || trimmed.startsWith('- ')) {
      bullets.push(trimmed.replace(/^- /, '* '));
    }
  }
  return bullets;
}

/**
 * Read one rendered decision log line back into an entry attributed to the
 * bot. Lines without a date take `fallbackTimestamp`.
 */
export function parseChangelogLine(line: string, fallbackTimestamp: string): ChangelogEntry {
  let timestamp = fallbackTimestamp;
  let rest = line.replace(/^\*\s+/, '').trim();

  const dated = ENTRY_PATTERN.exec(line.trim());
  if (dated) {
    timestamp = `${dated[1]}T00:00:00.000Z`;
    rest = dated[2].trim();
  }

  const suffix = ENTRY_SUFFIX_PATTERN.exec(rest);
  if (suffix) {
    return { timestamp, description: suffix[1], reason: suffix[2] ?? '', proposer: 'bot' };
  }
  return { timestamp, description: rest, reason: '', proposer: 'bot' };
}

export function parseDecisionLog(body: string, fallbackTimestamp: string): ChangelogEntry[] {
  return body
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(Boolean)
    .map(line => parseChangelogLine(line, fallbackTimestamp));
}

