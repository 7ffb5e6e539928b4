import logger from 'jet-logger';
import OpenAI from 'openai';

import { describeError, fail, ok, Result } from '@src/common/util/failures';


/******************************************************************************
                                 Types
******************************************************************************/

/**
 * One clause as returned by the model. `title` and `summary` are always
 * present after parsing; every other key is passed through untouched.
 */
export interface InterpretedClause {
  [key: string]: unknown;
  title: unknown;
  summary: unknown;
}

export interface ClauseInterpreter {
  extractClauses(documentText: string): Promise<Result<InterpretedClause[]>>;
}

/** The slice of the OpenAI client the interpreter calls. */
export interface CompletionClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}


/******************************************************************************
                                Constants
******************************************************************************/

const TEMPERATURE = 0.1; // low: extraction should be factual and repeatable
const MAX_TOKENS = 4000;

export const SYSTEM_PROMPT = `You are an expert legal document analyzer specializing in contract clause extraction.

Your task is to analyze legal contracts and extract all significant clauses into a structured format.

For each clause you identify, provide:
1. clause_type: The category of the clause (e.g., "payment_terms", "termination", "confidentiality", "liability", "governing_law", "dispute_resolution", "warranties", "indemnification", "term_duration", "renewal", "intellectual_property", etc.)
2. title: A brief, descriptive title for the clause
3. content: The full text of the clause exactly as it appears in the document
4. summary: A 1-2 sentence summary of what the clause means

Return your response as a valid JSON array of objects. Each object should have these exact keys: clause_type, title, content, summary.

Important guidelines:
- Extract ALL significant legal clauses, not just major ones
- Keep the original wording in the "content" field
- Be thorough but avoid duplicates
- If multiple clauses of the same type exist, number them (e.g., "payment_terms_1", "payment_terms_2")
- Return ONLY the JSON array, no additional text`;

export function buildUserPrompt(documentText: string): string {
  return `Analyze the following legal contract and extract all significant clauses.

Contract text:
${documentText}

Return a JSON array of all extracted clauses following the schema provided in the system message.`;
}


/******************************************************************************
                                Parsing
******************************************************************************/

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the clause array out of a model reply. The reply may carry prose
 * around the JSON, so only the span from the first `[` to the last `]` is
 * decoded. Non-object entries are dropped; `summary` and `title` are filled
 * in when missing, titles numbered by position in the raw array.
 */
export function parseClauseReply(responseText: string): Result<InterpretedClause[]> {
  const start = responseText.indexOf('[');
  const end = responseText.lastIndexOf(']');
  if (start === -1 || end === -1) {
    return fail('InterpreterFailure', 'Failed to parse LLM response: No JSON array found in response', {
      reason: 'ResponseFormatError',
    });
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(responseText.slice(start, end + 1));
  } catch (err) {
    logger.err(`Failed to parse LLM response as JSON: ${describeError(err)}`);
    logger.err(`Response text: ${responseText.slice(0, 500)}...`);
    return fail('InterpreterFailure', `Invalid JSON in LLM response: ${describeError(err)}`, {
      reason: 'InvalidJSON',
      cause: err,
    });
  }

  if (!Array.isArray(decoded)) {
    return fail('InterpreterFailure', 'Failed to parse LLM response: Response is not a JSON array', {
      reason: 'NotAnArray',
    });
  }

  const clauses: InterpretedClause[] = [];
  decoded.forEach((entry: unknown, idx) => {
    if (!isMapping(entry)) {
      logger.warn(`Skipping clause ${idx}: not an object`);
      return;
    }
    const missing = ['clause_type', 'title', 'content', 'summary'].filter((key) => !(key in entry));
    if (missing.length > 0) {
      logger.warn(`Clause ${idx} missing fields: ${missing.join(', ')}`);
    }
    clauses.push({
      ...entry,
      title: 'title' in entry ? entry.title : `Clause ${idx + 1}`,
      summary: 'summary' in entry ? entry.summary : '',
    });
  });
  return ok(clauses);
}


/******************************************************************************
                              Interpreter
******************************************************************************/

export class OpenAIClauseInterpreter implements ClauseInterpreter {
  public constructor(
    private readonly client: CompletionClient,
    private readonly model: string,
  ) {}

  public async extractClauses(documentText: string): Promise<Result<InterpretedClause[]>> {
    logger.info(`Sending contract to LLM for clause extraction (text length: ${documentText.length} chars)`);

    let responseText: string;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildUserPrompt(documentText) },
        ],
        temperature: TEMPERATURE,
        max_tokens: MAX_TOKENS,
      });
      responseText = (completion.choices[0]?.message.content ?? '').trim();
    } catch (err) {
      logger.err(`Error extracting clauses with LLM: ${describeError(err)}`);
      return fail('InterpreterFailure', `Failed to extract clauses: ${describeError(err)}`, {
        reason: 'ProviderError',
        cause: err,
      });
    }

    logger.info(`Received LLM response: ${responseText.length} characters`);

    const parsed = parseClauseReply(responseText);
    if (!parsed.ok) {
      return fail('InterpreterFailure', `Failed to extract clauses: ${parsed.error.message}`, {
        reason: parsed.error.reason,
        cause: parsed.error.cause,
      });
    }

    logger.info(`Successfully extracted ${parsed.value.length} clauses from contract`);
    return parsed;
  }
}
