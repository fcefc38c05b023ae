import { readFileSync } from 'node:fs';
import { z } from 'zod';

const lexiconSchema = z.object({
  tier1Sources: z.array(z.string()),
  boostKeywords: z.array(z.string()),
  penaltyKeywords: z.array(z.string()),
  bucketOntology: z.array(z.string()),
  topicMap: z.array(z.tuple([z.string(), z.string()])),
});

export type RankingLexicon = z.infer<typeof lexiconSchema>;

const LEXICON_URL = new URL('../../data/ranking-lexicon.json', import.meta.url);

/** Keyword lists, tier-1 sources and the topic ontology used by ranking. */
export const lexicon: RankingLexicon = lexiconSchema.parse(
  JSON.parse(readFileSync(LEXICON_URL, 'utf8')),
);
