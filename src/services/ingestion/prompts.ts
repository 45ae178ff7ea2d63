/**
 * Prompts sent with a whole PDF during ingestion
 *
 * @module services/ingestion/prompts
 */

export const METADATA_PROMPT = `Analyze this PDF document and extract the following information:
1. Title of the document/paper/study
2. Any ID present (Control ID, Abstract ID, Problem Statement ID, Paper ID, Study ID, etc.)

Return ONLY a valid JSON object:
{"title": "extracted title here", "id": "extracted id here"}

If you cannot find the title, use the first heading.
If you cannot find an ID, use "N/A".`;

export const TRANSCRIPTION_PROMPT = `Transcribe the full text of this PDF document.

- Keep the reading order of the original, including headings and captions.
- Keep the original language; do not translate or summarize.
- Reproduce tables row by row as plain text.
- Mark text you cannot read as [illegible].

Return only the transcribed text.`;
