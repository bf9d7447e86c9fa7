// Prompt templates for answer generation and re-ranking.

export const SYSTEM_PROMPT = `You are an expert AI assistant that provides accurate, well-reasoned answers based on the provided context.

Guidelines:
1. Answer based ONLY on the provided context
2. If information is insufficient, clearly state this limitation
3. Cite specific sources when making claims
4. Provide structured, clear responses
5. Acknowledge uncertainty when appropriate
6. Distinguish between facts and inferences`;

export const RELEVANCE_EVALUATOR_SYSTEM_PROMPT = 'You are a relevance evaluation expert.';

export function buildQueryPrompt(context: string, question: string): string {
  return `Context Information:
${context}

Question: ${question}

Instructions:
- Provide a comprehensive answer based on the context above
- Include specific citations using [Source: document_id] format
- If the context doesn't contain sufficient information, state this clearly
- Structure your response logically with clear reasoning

Answer:`;
}

export function buildRelevancePrompt(query: string, chunk: string): string {
  return `Evaluate the relevance of this document chunk to the query:
Query: ${query}
Chunk: ${chunk}

Rate relevance from 0.0 to 1.0 and provide a brief justification.
Response format: {"score": 0.0-1.0, "reason": "brief explanation"}`;
}
