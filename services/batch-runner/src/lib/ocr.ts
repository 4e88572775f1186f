/**
 * LLM Vision OCR
 *
 * OCR collaborator backed by the OpenAI vision API: the PDF is sent as a
 * file part and the model transcribes its pages verbatim, reporting how
 * legible they were. Field extraction stays with the layout extractors.
 */

import fs from 'fs';
import path from 'path';
import OpenAI from 'openai';
import {
  config,
  logger,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  type OcrEngine,
  type OcrRequest,
  type OcrResult,
  type PageText,
} from '@ledgerline/shared';

const TRANSCRIPTION_SYSTEM_PROMPT = `You are an OCR engine for scanned Brazilian fiscal documents (NFS-e service invoices, SEFIP and FGTS payroll reports).
Transcribe the text of each page exactly as printed, line by line, top to bottom. Keep numbers, punctuation, CNPJ/CNO registration numbers and monetary values unchanged.
Do not summarize, translate or correct anything. Report a confidence between 0 and 1 for how legible the pages were.`;

/**
 * JSON Schema for OpenAI Structured Outputs.
 */
const TRANSCRIPTION_SCHEMA = {
  name: 'page_transcription',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    required: ['pages', 'confidence'],
    properties: {
      pages: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          required: ['page_number', 'text'],
          properties: {
            page_number: { type: 'integer' },
            text: { type: 'string' },
          },
        },
      },
      confidence: { type: 'number' },
    },
  },
} as const;

interface TranscriptionPayload {
  pages: Array<{ page_number: number; text: string }>;
  confidence: number;
}

function isTranscribedPage(value: unknown): value is { page_number: number; text: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'page_number' in value &&
    typeof value.page_number === 'number' &&
    'text' in value &&
    typeof value.text === 'string'
  );
}

export function isTranscriptionPayload(value: unknown): value is TranscriptionPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'confidence' in value &&
    typeof value.confidence === 'number' &&
    'pages' in value &&
    Array.isArray(value.pages) &&
    value.pages.every(isTranscribedPage)
  );
}

export function rotationInstruction(rotation: OcrRequest['rotation']): string {
  return rotation === 180
    ? 'The pages were scanned upside down. Read each page rotated by 180 degrees.'
    : 'Read the pages in their upright orientation.';
}

/**
 * Convert the model's payload to the OCR result, keeping at most
 * `maxPages` pages and clamping confidence to 0-1.
 */
export function toOcrResult(payload: TranscriptionPayload, maxPages: number): OcrResult {
  const pages: PageText[] = payload.pages
    .filter((page) => page.page_number >= 1 && page.page_number <= maxPages)
    .sort((a, b) => a.page_number - b.page_number)
    .map((page) => ({ pageNumber: page.page_number, text: page.text }));
  const confidence = Math.min(1, Math.max(0, payload.confidence));
  return { pages, confidence };
}

export class VisionOcrEngine implements OcrEngine {
  private readonly openai: OpenAI;

  constructor(
    private readonly model: string = config.ocrModel,
    apiKey: string = config.openaiApiKey
  ) {
    this.openai = new OpenAI({ apiKey, timeout: config.llmRequestTimeoutMs });
  }

  async recognize(request: OcrRequest): Promise<OcrResult> {
    const pdfBuffer = await fs.promises.readFile(request.path);
    const base64Pdf = pdfBuffer.toString('base64');

    const userPrompt = `${rotationInstruction(request.rotation)}
Transcribe at most the first ${request.maxPages} pages.`;

    logger.info('Recognizing document with vision model', {
      model: this.model,
      rotation: request.rotation,
      pdf_size_bytes: pdfBuffer.length,
    });

    const startTime = Date.now();

    let response: OpenAI.Chat.Completions.ChatCompletion;
    try {
      response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: TRANSCRIPTION_SYSTEM_PROMPT },
          {
            role: 'user',
            content: [
              {
                type: 'file',
                file: {
                  filename: path.basename(request.path),
                  file_data: `data:application/pdf;base64,${base64Pdf}`,
                },
              },
              { type: 'text', text: userPrompt },
            ],
          },
        ],
        response_format: {
          type: 'json_schema',
          json_schema: TRANSCRIPTION_SCHEMA,
        },
        temperature: 0,
      });
    } catch (error) {
      llmRequestDurationHistogram.observe({ model: this.model }, (Date.now() - startTime) / 1000);
      llmRequestsCounter.inc({ model: this.model, status: 'error' });
      logger.error('Vision transcription failed', error, { model: this.model });
      throw error;
    }

    const duration = (Date.now() - startTime) / 1000;
    llmRequestDurationHistogram.observe({ model: this.model }, duration);
    llmRequestsCounter.inc({ model: this.model, status: 'success' });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('Empty transcription response from OpenAI');
    }

    const payload: unknown = JSON.parse(content);
    if (!isTranscriptionPayload(payload)) {
      throw new Error('Transcription response does not match its schema');
    }

    const result = toOcrResult(payload, request.maxPages);
    logger.info('Vision transcription complete', {
      model: this.model,
      request_id: response.id,
      duration_seconds: duration,
      pages: result.pages.length,
      confidence: result.confidence,
    });
    return result;
  }
}
