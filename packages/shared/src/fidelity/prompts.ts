/**
 * Transcription prompts for the vision engines.
 */

export const STANDARD_TRANSCRIPTION_PROMPT = `Transcribe the text of this scanned letter page.
Keep the original wording, line order and paragraph breaks.
Return only the text of the page.`;

/** Used by the remediation pass on output that failed verification */
export const CONSTRAINED_TRANSCRIPTION_PROMPT = `Transcribe exactly what you see in this document image.
Rules:
- Copy the text verbatim, preserving the original wording, spelling, and punctuation.
- Maintain paragraph breaks.
- Do NOT summarize, paraphrase, or describe the document.
- Do NOT add commentary, headers, or labels that are not in the original.
- If a word or section is illegible, write [illegible] in its place.
- Return ONLY the transcribed text.`;
