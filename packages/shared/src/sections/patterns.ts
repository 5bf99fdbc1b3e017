/**
 * Section header, end-of-letter and boilerplate patterns.
 *
 * Header patterns are evaluated in list order and the first pattern to match
 * wins for its section type, so strict forms come before the OCR-tolerant
 * ones. Matching is deliberately loose; the parser validates afterwards.
 */

import type { SectionType } from '../types';

export type FormatEra = 'modern' | 'numbered' | 'old' | 'ocr';

export interface HeaderPattern {
  pattern: RegExp;
  section: SectionType;
  era: FormatEra;
}

const ROMAN = '(?:I{1,4}|IV|V|VI{0,3})';

function header(source: string, section: SectionType, era: FormatEra): HeaderPattern {
  return { pattern: new RegExp(`^[ \\t]{0,4}${source}`, 'im'), section, era };
}

export const SECTION_PATTERNS: readonly HeaderPattern[] = [
  // Header alone on its line
  header('QUESTIONS?\\s*$', 'question', 'modern'),
  header('CONCLUSIONS?\\s*$', 'conclusion', 'modern'),
  header('FACTS(?:\\s+AS\\s+PRESENTED(?:\\s+BY\\s+REQUESTER)?)?\\s*$', 'facts', 'modern'),
  header('ANALYSIS\\s*$', 'analysis', 'modern'),

  // Header with colon
  header('QUESTIONS?\\s*:', 'question', 'modern'),
  header('CONCLUSIONS?\\s*:', 'conclusion', 'modern'),
  header('FACTS\\s*:', 'facts', 'modern'),
  header('ANALYSIS\\s*:', 'analysis', 'modern'),

  // Numbered: first occurrence only
  header('QUESTIONS?\\s+1\\s*[:.\\n]', 'question', 'numbered'),
  header('(?:CONCLUSIONS?|ANSWERS?)\\s+1\\s*[:.\\n]', 'conclusion', 'numbered'),

  // Older letters
  header('QUESTIONS?\\s+PRESENTED\\s*[:\\n]?', 'question', 'old'),
  header('ISSUES?\\s+PRESENTED\\s*[:\\n]?', 'question', 'old'),
  header('SHORT\\s+ANSWERS?\\s*[:\\n]?', 'conclusion', 'old'),
  header('SUMMARY(?:\\s+OF\\s+CONCLUSIONS?)?\\s*[:\\n]?', 'conclusion', 'old'),
  header('DISCUSSION\\s*[:\\n]?', 'analysis', 'old'),
  header('BACKGROUND\\s*[:\\n]?', 'facts', 'old'),
  header('STATEMENT\\s+OF\\s+FACTS?\\s*[:\\n]?', 'facts', 'old'),
  header('FACTUAL\\s+BACKGROUND\\s*[:\\n]?', 'facts', 'old'),
  header('LEGAL\\s+ANALYSIS\\s*[:\\n]?', 'analysis', 'old'),

  // OCR damage: only reached when the clean forms found nothing
  header('[OQ]UESTIONS?\\s*[:\\n]?$', 'question', 'ocr'),
  header('Q\\s*U\\s*E\\s*S\\s*T\\s*I\\s*O\\s*N', 'question', 'ocr'),
  header('C\\s*O\\s*N\\s*C\\s*L\\s*U\\s*S\\s*I\\s*O\\s*N', 'conclusion', 'ocr'),
  header('A\\s*N\\s*A\\s*L\\s*Y\\s*S\\s*I\\s*S', 'analysis', 'ocr'),
  header('QUESTTONS?\\s*[:\\n]?$', 'question', 'ocr'),
  header('ANALYSTS\\s*[:\\n]?$', 'analysis', 'ocr'),
  header('[rF]ACTS\\s*[:\\n]?$', 'facts', 'ocr'),
  header('CONCLUSIONS?\\s+AND\\s+ANALYSIS\\s*[:\\n]?$', 'conclusion', 'ocr'),
  header('QT\\.?J?E?S?T?[TI]?ON', 'question', 'ocr'),
  header('[OQ]UE?STI?\\s+ON', 'question', 'ocr'),
  header('[OQ]UESTTON', 'question', 'ocr'),
  header('CONCLUS[fI]?ONS?\\s*[:\\n]?$', 'conclusion', 'ocr'),
  header('CONCLU\\s*S\\s*IONS?\\s*[:\\n]?$', 'conclusion', 'ocr'),
  header('FACT\\s+S\\b', 'facts', 'ocr'),
  header('A[I}\\]\\\\NM]+[LA]*[LY]+S[IT1]S\\s*[:\\n]?$', 'analysis', 'ocr'),
  header('ANA\\s*LYSIS\\s*[:\\n]?$', 'analysis', 'ocr'),
  header('ANALYS[NI][SNI]?\\s*[:\\n]?$', 'analysis', 'ocr'),
  header("F['`’]?\\s*ACTS\\s*[:\\n]?$", 'facts', 'ocr'),

  // Roman numeral prefixes: "II. CONCLUSION"
  header(`${ROMAN}\\.?\\s+QUESTIONS?\\s*[:\\n]?$`, 'question', 'numbered'),
  header(`${ROMAN}\\.?\\s+(?:CONCLUSIONS?|SHORT\\s+ANSWERS?)\\s*[:\\n]?$`, 'conclusion', 'numbered'),
  header(`${ROMAN}\\.?\\s+FACTS?\\s*[:\\n]?$`, 'facts', 'numbered'),
  header(`${ROMAN}\\.?\\s+(?:ANALYSIS|DISCUSSION)\\s*[:\\n]?$`, 'analysis', 'numbered'),
];

/** Valedictions and closing phrases that end the last section */
export const DOCUMENT_END_PATTERNS: readonly RegExp[] = [
  /\n[ \t]*Sincerely,/i,
  /\n[ \t]*Very truly yours,/i,
  /\n[ \t]*Respectfully,/i,
  /\n[ \t]*Respectfully submitted,/i,
  /\n[ \t]*General Counsel/i,
  /\n[ \t]*Chief Counsel/i,
  /\n[ \t]*\*\s*\*\s*\*[ \t]*\n/i,
  /\n[ \t]*\* \* \*[ \t]*\n/i,
  /\n[ \t]*[Ss]incerely\s*[,.]/i,
  /\n[ \t]*[Ss]incere[1l]y\s*[,.]/i,
  /\n[ \t]*If you have (?:any )?(?:other |further |additional )?questions/i,
  /\n[ \t]*(?:However,?\s+)?[Ss]hould you have (?:any )?(?:other |further |additional )?questions/i,
  /\n[ \t]*If I can be of (?:any )?further (?:assistance|help)/i,
  /\n[ \t]*Please do not hesitate to (?:contact|call)/i,
  /\n[ \t]*If (?:we|I) can be of (?:any )?(?:additional )?assistance/i,
  /\n[ \t]*Please feel free to contact/i,
  /\n[ \t]*If you wish to file a complaint/i,
  /\n[ \t]*I\s+hope\s+(?:this|that(?:\s+this)?)\s+(?:response|letter|opinion)\s+(?:has\s+been|is)\s+(?:of\s+)?(?:assistance|helpful)/i,
  /\n[ \t]*I\s+trust\s+(?:this|that)\s+(?:answers|responds|adequately)/i,
];

/**
 * Footnotes, running headers and letterhead that bleed into section text.
 * Spans are bounded so a stray phrase cannot swallow the rest of the letter.
 * Flags: global, case-insensitive, dot matches newline.
 */
export const BOILERPLATE_PATTERNS: readonly RegExp[] = [
  // Act footnote, clean
  /\d?\s*The Political Reform Act is contained in Government Code Sections?\s+81000.{0,800}?(?:unless otherwise indicated\.?\s*)/gis,
  // Act footnote with a misread footnote marker or garbled "Government"
  /[1ItI'/]?\s*(?:The\s+)?[Pp]olitical\s+[Rr]efor[mn]\w?\s+[Aa]ct\s+is\s+conta[im]\w+\s+in\s+G[\w.,"'*\s]{0,15}(?:Code|code)\s+[Ss]ect\w*\s+(?:8[1lI]0{2,3}|SIOOO).{0,800}?(?:unless\s+otherwise\s+indicated|California\s+Code\s+of\s+Reg|Code\s+of\s+Reg).{0,400}?(?:indicated\.?\s*|Regulations?\.?\s*)/gis,
  // Act footnote, heavily garbled: anchored on the code range
  /[1ItI'/]?\s*G[\w.,"\s]{0,12}(?:Code|code)\s+[Ss]ect\w*\s+(?:8[1lI]0{2,3}|SIOOO)[\s\S]{0,300}?(?:unless\s+otherwise\s+indicated|Cal\w*\s+Code\s+of\s+Reg\w*)\.?\s*/gis,
  // Regulation footnote
  /[1ItI'/]?\s*(?:The\s+)?[Rr]eg\w+\s+of\s+the\s+Fair\s+Political\s+Practices\s+Comm\w+\s+are\s+contained.{0,800}?(?:unless\s+otherwise\s+indicated|California\s+Code\s+of\s+Reg\w*)\.?\s*/gis,
  // Combined act and regulation footnote
  /[1ItI'/]?\s*(?:The\s+)?[Pp]olitical\s+[Rr]eform\s+[Aa]ct.{0,800}?(?:California\s+Code\s+of\s+Reg\w*|Code\s+of\s+Reg\w*)[\s\S]{0,50}?(?:unless\s+otherwise\s+indicated|otherwise\s+indicated)\.?\s*/gis,
  // Running header with file number (OCR: A read as 4, I as 1)
  /File\s+No\.\s*[AIM41]?-?\d{2}-?\d{3,4}\s*(?:[/\n]\s*Page\s*(?:No\.)?\s*\d+)?/gis,
  // "Re: Your File No." header line
  /\n\s*Re:\s+(?:Your\s+)?(?:File|Letter)\s+No\.?\s*[AIM]?-?\d{2}-?\d{3,4}/gis,
  // Commission street address
  /(?:428\s+J\s+Street|1102\s+Q\s+Street).{0,200}?(?:\d{5}(?:-\d{4})?)/gis,
  // Page references
  /\n\s*Page\s+(?:No\.)?\s*\d+(?:\s+of\s+\d+)?/gis,
  // Old footnote style: "1/ Government Code Section 81000-91015..."
  /\d\s*\/\s*G[\w.,"\s]{0,12}(?:Code|code)\s+[Ss]ect\w*\s+8[1lI]0{2,3}.{0,400}?(?:\d{5}(?:-\d{4})?)/gis,
  // "All regulatory references are to Title 2..." (AJI, A1l, AII, A11)
  /A[Il1J][Il1J]\s+regulatory\s+references\s+ar[ec]\s+to\s+Title\s+2.{0,400}?(?:unless\s+otherwise\s+indicated|otherwise\s+indicated)\.?\s*/gis,
  // "Commission regulations appear at 2 California Administrative Code..."
  /Commission\s+regulations?\s+appear\s+at\s+.{0,300}?(?:Code\s+(?:of\s+)?Reg|Administrative\s+Code)\w*.{0,300}?(?:et\s+seq\.?|section\s+\d{4,5})/gis,
  // "All statutory references are to the Government Code..."
  /A[Il1J][Il1J]\s+statutory\s+references\s+ar[ec]\s+to\s+the\s+Government\s+Code.{0,400}?(?:unless\s+otherwise\s+indicated|otherwise\s+indicated)\.?\s*/gis,
  // Informal assistance footnote fused to the preceding word ("word2 Informal...")
  /\w+\d\s+Informal\s+assistance\s+does\s+not\s+provide.{0,400}?(?:subject\s+to\s+penalty|Commission\s+action|enforcement\s+action).{0,200}?\.?\s*/gis,
  // Informal assistance footnote on its own line
  /\n\s*\d\s+Informal\s+assistance\s+does\s+not\s+provide.{0,400}?(?:subject\s+to\s+penalty|Commission\s+action|enforcement\s+action).{0,200}?\.?\s*/gis,
  // Letterhead, possibly letter-spaced
  /(?:FAIR\s+POLITICAL\s+PRACTICES\s+COMMISSION|F\s*A\s*I\s*R\s*P\s*O\s*L\s*I\s*T\s*I\s*C\s*A\s*L).{0,300}?(?:Sacramento|SACRAMENTO).{0,100}?(?:\d{5})/gis,
];
