// General agent - narrative lookup for questions no rule claims

import type { SubQuery } from '../types/query.js';
import { splitSentences } from '../utils/text.js';
import {
  BaseSpecialistAgent, pageRef, retrievalGap, type AgentDependencies, type Findings,
} from './specialist-agent.js';

export const MAX_EXCERPTS = 3;
const EXCERPT_CHARS = 320;

function excerpt(text: string): string {
  let out = '';
  for (const sentence of splitSentences(text)) {
    const next = out ? `${out} ${sentence}` : sentence;
    if (next.length > EXCERPT_CHARS && out) break;
    out = next;
  }
  return out.length > EXCERPT_CHARS ? `${out.slice(0, EXCERPT_CHARS - 3)}...` : out;
}

export class GeneralAgent extends BaseSpecialistAgent {
  constructor(deps: AgentDependencies) {
    super('general', 'GeneralAgent', deps);
  }

  protected async investigate(subQuery: SubQuery, signal?: AbortSignal): Promise<Findings> {
    const result = await this.search(subQuery.question, subQuery.filters, signal);
    const supporting = result.candidates.slice(0, MAX_EXCERPTS);
    if (supporting.length === 0) {
      return {
        text: 'No relevant passages were found in the indexed statements.',
        supporting: [],
        checks: [{ name: 'candidates-found', passed: false, required: true }],
        gap: retrievalGap(result),
        details: {},
      };
    }

    const excerpts = supporting.map(c => ({ candidate: c, text: excerpt(c.chunk.text) }));
    return {
      text: excerpts.map(e => `${e.text} (${e.candidate.chunk.documentId}, ${pageRef(e.candidate)})`).join('\n\n'),
      supporting,
      checks: [{ name: 'candidates-found', passed: true, required: true }],
      facts: excerpts.map(e => e.text),
      details: { candidates: result.candidates.length },
    };
  }
}
