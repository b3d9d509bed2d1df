import { GoogleGenerativeAI } from '@google/generative-ai';
import { z } from 'zod';
import type { AnnotatedListing, Listing, ListingAnnotation } from '../types/listing';
import type { Logger } from '../utils/logger';

/**
 * Attaches relevance annotations for display
 * Never changes a listing's canonical fields or identity
 */
export interface ListingEnricher {
  annotate(listings: readonly Listing[], skillsQuery: string): Promise<AnnotatedListing[]>;
}

export class NoopEnricher implements ListingEnricher {
  async annotate(listings: readonly Listing[]): Promise<AnnotatedListing[]> {
    return listings.map(listing => ({ listing }));
  }
}

export interface TextModel {
  generate(prompt: string): Promise<string>;
}

export function createGeminiModel(apiKey: string, modelId: string, timeoutMs: number = 30000): TextModel {
  const genAI = new GoogleGenerativeAI(apiKey);
  const model = genAI.getGenerativeModel({ model: modelId }, { timeout: timeoutMs });

  return {
    async generate(prompt) {
      const resp = await model.generateContent(prompt);
      return resp.response.text();
    },
  };
}

const annotationSchema = z.object({
  match_score: z.coerce.number(),
  reason: z.string().default(''),
});

/**
 * Extract the JSON object from a model answer that may wrap it in prose or code fences
 */
export function extractJson(response: string): string {
  const trimmed = response.trim();

  const jsonBlockMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (jsonBlockMatch) {
    return jsonBlockMatch[1].trim();
  }

  const jsonMatch = trimmed.match(/\{[\s\S]*\}/);
  return jsonMatch ? jsonMatch[0] : trimmed;
}

export function parseAnnotation(response: string): ListingAnnotation | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJson(response));
  } catch {
    return undefined;
  }

  const result = annotationSchema.safeParse(parsed);
  if (!result.success || isNaN(result.data.match_score)) {
    return undefined;
  }

  return {
    score: Math.min(100, Math.max(0, Math.round(result.data.match_score))),
    rationale: result.data.reason.trim(),
  };
}

export function buildMatchPrompt(listing: Listing, skillsQuery: string): string {
  return [
    'Given the following internship opportunity and user skills, provide a match score (0-100) and brief reason.',
    '',
    'Internship:',
    `Company: ${listing.company}`,
    `Role: ${listing.role}`,
    `Location: ${listing.location}`,
    '',
    `User Skills: ${skillsQuery}`,
    '',
    'Respond in JSON format: {"match_score": <number>, "reason": "<reason>"}',
  ].join('\n');
}

export interface GeminiEnricherOptions {
  logger: Logger;
  maxListings: number;
}

/**
 * Scores the first few listings against the user's skills with Gemini
 * Listings past the limit, or whose answer cannot be parsed, stay unannotated
 */
export class GeminiEnricher implements ListingEnricher {
  constructor(
    private model: TextModel,
    private options: GeminiEnricherOptions
  ) {}

  async annotate(listings: readonly Listing[], skillsQuery: string): Promise<AnnotatedListing[]> {
    const annotated: AnnotatedListing[] = [];

    for (const [index, listing] of listings.entries()) {
      if (index >= this.options.maxListings) {
        annotated.push({ listing });
        continue;
      }

      try {
        const response = await this.model.generate(buildMatchPrompt(listing, skillsQuery));
        const annotation = parseAnnotation(response);
        if (!annotation) {
          this.options.logger.debug(`Unparseable match answer for ${listing.company}`, { response });
        }
        annotated.push(annotation ? { listing, annotation } : { listing });
      } catch (error) {
        this.options.logger.warn(`Match scoring failed for ${listing.company}`, {
          error: error instanceof Error ? error.message : String(error),
        });
        annotated.push({ listing });
      }
    }

    return annotated;
  }
}
