/**
 * Citation pattern families. Capture group 1 is the cited number for the
 * statute, regulation and prior-decision families; external citations use the
 * whole match.
 */

const SUBSECTION = '(?:\\s*\\([a-z]\\))?(?:\\s*\\(\\d+\\))?';

function family(sources: string[]): readonly RegExp[] {
  return sources.map((source) => new RegExp(source, 'gi'));
}

/** Government Code sections of the Political Reform Act */
export const STATUTE_PATTERNS = family([
  `Government\\s+Code\\s+[Ss]ections?\\s+(\\d{5}${SUBSECTION})`,
  `Gov(?:\\.|ernment)\\s+Code,?\\s*§+\\s*(\\d{5}${SUBSECTION})`,
  `[Ss]ections?\\s+(\\d{5}${SUBSECTION})`,
  `§+\\s*(\\d{5}${SUBSECTION})`,
]);

/** Commission regulations, Title 2 of the California Code of Regulations */
export const REGULATION_PATTERNS = family([
  '[Rr]egulations?\\s+(\\d{5}(?:\\.\\d+)?)',
  '2\\s+Cal\\.?\\s+Code\\s+(?:of\\s+)?Regs?\\.?\\s*§?\\s*(\\d{5}(?:\\.\\d+)?)',
  'FPPC\\s+[Rr]egulations?\\s+(\\d{5}(?:\\.\\d+)?)',
  'tit\\.?\\s*2,?\\s*§?\\s*(\\d{5}(?:\\.\\d+)?)',
  'Title\\s+2,?\\s+[Ss]ections?\\s+(\\d{5}(?:\\.\\d+)?)',
]);

/** Prior advice letters and opinions */
export const PRIOR_DECISION_PATTERNS = family([
  '\\b([AIM]-\\d{2}-\\d{3})\\b',
  'No\\.?\\s*([AIM]-\\d{2}-\\d{3})',
  '[Aa]dvice\\s+[Ll]etter\\s+(?:No\\.?\\s*)?(\\d{5})',
  'In\\s+re\\s+\\w+,?\\s+([AIM]-\\d{2}-\\d{3})',
  '[Oo]pinion\\s+(?:No\\.?\\s*)?(\\d{2}-\\d{3})',
  '(?:Our\\s+)?File\\s+No\\.?\\s*([AIM]-\\d{2}-\\d{3})',
]);

/** Court reporters and formal Commission opinions */
export const EXTERNAL_PATTERNS = family([
  '\\d+\\s+Cal\\.?\\s*(?:App\\.?\\s*)?(?:2d|3d|4th|5th)?\\s+\\d+',
  '\\d+\\s+Cal\\.?\\s*(?:2d|3d|4th|5th)\\s+\\d+',
  '\\d+\\s+U\\.S\\.\\s+\\d+',
  '\\d+\\s+F\\.(?:2d|3d)\\s+\\d+',
  '\\d+\\s+F\\.\\s*Supp\\.?(?:\\s*2d)?\\s+\\d+',
  'In\\s+re\\s+\\w+\\s*\\(\\d{4}\\)\\s*\\d+\\s+FPPC\\s+Ops\\.?\\s+\\d+',
  '\\d+\\s+Cal\\.?\\s*Rptr\\.?(?:\\s*2d|3d)?\\s+\\d+',
]);

/** "Our File No. A-90-753", "File No. 90753", "File No. I 90-753" */
export const FILE_NUMBER_PATTERN = /(?:Our\s+)?File\s+No\.?\s*([AIM]?)\s*-?\s*(\d{2})\s*-?\s*(\d{3,4})/i;

export const STATUTE_RANGE = { min: 81000, max: 92000 } as const;
export const REGULATION_RANGE = { min: 18000, max: 19000 } as const;
