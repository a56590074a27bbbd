import labels from './labels.json';
import { MISSING_FIELD, type ScrapedJob } from '../types/job';
import { parseLongDate } from '../utils/dates';
import { attribute, findElements, findFirst, textOf } from './html';

type LabelField = 'company' | 'jobTitle' | 'experience' | 'location';

const LABEL_FIELDS: LabelField[] = ['company', 'jobTitle', 'experience', 'location'];

function isLabelField(value: string): value is LabelField {
  return LABEL_FIELDS.some(field => field === value);
}

const TABLE_LABELS = new Map<string, LabelField>(
  LABEL_FIELDS.flatMap(field =>
    labels.table[field].map((label): [string, LabelField] => [label, field])
  )
);

const PARAGRAPH_LABELS = new Map<string, LabelField>(
  Object.entries(labels.paragraph).flatMap(([label, field]): Array<[string, LabelField]> =>
    isLabelField(field) ? [[label, field]] : []
  )
);

const DESCRIPTION_HEADINGS = new Set(labels.descriptionHeadings);

const DESCRIPTION_HEADING_PATTERN = new RegExp(
  '\\b(' +
    [
      'jobs?\\s+descriptions?',
      'jobs?\\s+summary',
      'responsibilit(y|ies)',
      'key\\s+duties',
      'position\\s+(description|overview|profile|objective|information)',
      'about\\s+(the\\s+)?(job|role)',
      'about\\s+position',
      'what\\s+you(\'ll|\\s+will)?\\s+(be\\s+)?do(ing)?',
      'your\\s+role',
      'opportunity\\s+details',
      'details\\s+about\\s+(the\\s+)?role',
      'role\\s+(overview|description)',
      'work\\s+(details|summary)',
      'job\\s+(profile|purpose|objective|information|functions)',
      '(profile|career|professional)\\s+summary',
      'description\\s+of\\s+(duties|role)',
    ].join('|') +
    ')'
);

// Headings are short; longer paragraphs that mention "your role" are body text.
const MAX_HEADING_LENGTH = 80;

const TITLE_COMPANY_PATTERN = /^(.+?)\s+(Walk-?in|Off[\s-]*Campus|Recruitment|Hiring|Jobs|Careers)\b/i;
const TITLE_ROLE_PATTERN = /\bas\s+([^|:]+?)(\s+with|\s*\||$)/i;
const DESCRIPTION_CUTOFF = 'Join our WhatsApp';

export interface ExtractOptions {
  /** Accept <th> label cells and rows wider than two cells */
  headerCells: boolean;
  /** Lower-case anchor text that marks the apply link when no label is present */
  applyPhrase: string;
  /** Where datePosted comes from */
  dateSource: 'today' | 'page';
  /** YYYY-MM-DD used when the page gives no date */
  today: string;
}

export function normalizeLabel(text: string): string {
  return text.trim().replace(/[\s:\-\u2013]+$/, '').toLowerCase();
}

function splitLabelLine(text: string): [string, string] | null {
  const colon = /^([^:]+):\s*(.+)$/s.exec(text);
  if (colon) return [colon[1], colon[2]];

  const space = /^(\S+)\s+(.+)$/s.exec(text);
  return space ? [space[1], space[2]] : null;
}

type Fields = Partial<Record<LabelField, string>>;

function fieldsFromTable(html: string, options: ExtractOptions): Fields {
  const fields: Fields = {};
  const table = findFirst(html, ['table']);
  if (!table) return fields;

  const cellTags = options.headerCells ? ['td', 'th'] : ['td'];
  for (const row of findElements(table.inner, ['tr'])) {
    const cells = findElements(row.inner, cellTags);
    if (options.headerCells ? cells.length < 2 : cells.length !== 2) continue;

    const field = TABLE_LABELS.get(normalizeLabel(textOf(cells[0].inner)));
    const value = textOf(cells[1].inner);
    if (field && value) fields[field] = value;
  }
  return fields;
}

function fillFromParagraphs(html: string, fields: Fields): void {
  for (const p of findElements(html, ['p'])) {
    const text = textOf(p.inner);
    if (!text) continue;

    const parts = splitLabelLine(text);
    if (!parts) continue;

    const field = PARAGRAPH_LABELS.get(normalizeLabel(parts[0]));
    const value = parts[1].trim();
    if (field && value && !fields[field]) fields[field] = value;
  }
}

function fillFromHeading(html: string, fields: Fields): void {
  const heading = findFirst(html, ['h1', 'h2']);
  if (!heading) return;
  const text = textOf(heading.inner);

  const company = TITLE_COMPANY_PATTERN.exec(text);
  if (company && !fields.company) fields.company = company[1].trim();

  const role = TITLE_ROLE_PATTERN.exec(text);
  if (role && !fields.jobTitle) fields.jobTitle = role[1].trim();
}

function isDescriptionHeading(text: string): boolean {
  const lower = text.trim().toLowerCase();
  if (!lower || lower.length > MAX_HEADING_LENGTH) return false;
  return DESCRIPTION_HEADINGS.has(normalizeLabel(lower)) || DESCRIPTION_HEADING_PATTERN.test(lower);
}

function extractDescription(html: string): string {
  const parts: string[] = [];

  const aboutLabel = findElements(html, ['strong', 'b'])
    .find(el => textOf(el.inner).toLowerCase().includes('about company'));
  if (aboutLabel) {
    const aboutParagraph = findFirst(html, ['p'], aboutLabel.end);
    const aboutText = aboutParagraph ? textOf(aboutParagraph.inner) : '';
    if (aboutText) parts.push(aboutText);
  }

  const heading = findElements(html, ['p']).find(p => isDescriptionHeading(textOf(p.inner)));
  if (heading) {
    const rest = html.slice(heading.end);
    const nextSection = rest.search(/<h[1-6]\b/i);
    const section = nextSection === -1 ? rest : rest.slice(0, nextSection);
    for (const el of findElements(section, ['p', 'li'])) {
      const text = textOf(el.inner);
      if (text) parts.push(text);
    }
  }

  if (parts.length === 0) return MISSING_FIELD;
  return parts.join('\n\n').split(DESCRIPTION_CUTOFF)[0].trim();
}

function extractApplyLink(html: string, applyPhrase: string): string {
  const label = findElements(html, ['strong', 'b'])
    .find(el => textOf(el.inner).toLowerCase().includes('apply link'));
  if (label) {
    const anchor = findFirst(html, ['a'], label.end);
    const href = anchor && attribute(anchor.attrs, 'href');
    if (href) return href;
  }

  for (const anchor of findElements(html, ['a'])) {
    if (!textOf(anchor.inner).toLowerCase().includes(applyPhrase)) continue;
    const href = attribute(anchor.attrs, 'href');
    if (href) return href;
  }

  return MISSING_FIELD;
}

/**
 * Pulls the job fields out of a posting page.
 * Labelled table rows win, then "Label: value" paragraphs, then the page title.
 */
export function extractJob(html: string, url: string, options: ExtractOptions): ScrapedJob {
  const fields = fieldsFromTable(html, options);
  fillFromParagraphs(html, fields);
  fillFromHeading(html, fields);

  const datePosted = options.dateSource === 'page'
    ? parseLongDate(textOf(html)) ?? options.today
    : options.today;

  const company = fields.company || MISSING_FIELD;
  const jobTitle = fields.jobTitle || MISSING_FIELD;

  return {
    company,
    jobTitle,
    experience: fields.experience || MISSING_FIELD,
    location: fields.location || MISSING_FIELD,
    applyLink: extractApplyLink(html, options.applyPhrase),
    description: extractDescription(html) || MISSING_FIELD,
    title: `${company} | ${jobTitle}`,
    sourceLink: url,
    datePosted,
  };
}
