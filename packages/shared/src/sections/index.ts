export { parseSections, cleanSectionContent, stripBoilerplate, containsSectionHeader, sectionConfidence, type SectionParseOptions } from './parser';
export { SECTION_PATTERNS, DOCUMENT_END_PATTERNS, BOILERPLATE_PATTERNS, type HeaderPattern, type FormatEra } from './patterns';
