import OpenAI from 'openai';
import { z } from 'zod';
import { UpstreamError, describeError } from '../../shared/errors.js';
import type { OpenAiConfig } from '../../shared/config/appConfig.js';
import type { JobRecord } from '../jobs/jobs.types.js';
import type { ResumeRecord } from '../resumes/resumes.types.js';
import { ANALYSIS_SYSTEM_PROMPT, buildAnalysisPrompt } from './analysisPrompt.js';
import type { RelevanceAnalyzer, RelevanceAssessment } from './analyses.types.js';

export interface ChatCompletionRequest {
  model: string;
  messages: Array<{ role: 'system' | 'user'; content: string }>;
  temperature: number;
  max_tokens: number;
}

export interface ChatCompletionReply {
  choices: Array<{ message: { content: string | null } }>;
}

// The slice of the OpenAI client used here; tests hand in a fake
export interface ChatCompletionsApi {
  create(body: ChatCompletionRequest): Promise<ChatCompletionReply>;
}

const analysisResponseSchema = z.object({
  relevance_score: z.number().min(0).max(1),
  strengths: z.array(z.string()),
  weaknesses: z.array(z.string()),
  recommendations: z.array(z.string()),
  job_match_percentage: z.number().min(0).max(100),
  analysis_text: z.string()
});

/**
 * Pulls the JSON object out of a model reply (first `{` to last `}`) and validates it.
 */
export const parseAnalysisReply = (content: string | null | undefined): RelevanceAssessment => {
  if (!content) {
    throw new UpstreamError('The model returned an empty reply.');
  }
  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new UpstreamError('The model reply contains no JSON object.');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content.slice(start, end + 1));
  } catch (error) {
    throw new UpstreamError('The model reply is not valid JSON.', error);
  }

  const result = analysisResponseSchema.safeParse(parsed);
  if (!result.success) {
    throw new UpstreamError(`The model reply has an unexpected shape: ${result.error.message}`, result.error);
  }

  return {
    relevanceScore: result.data.relevance_score,
    jobMatchPercentage: result.data.job_match_percentage,
    strengths: result.data.strengths,
    weaknesses: result.data.weaknesses,
    recommendations: result.data.recommendations,
    analysisText: result.data.analysis_text
  };
};

export class OpenAiRelevanceAnalyzer implements RelevanceAnalyzer {
  constructor(
    private readonly completions: ChatCompletionsApi,
    private readonly settings: Omit<OpenAiConfig, 'apiKey'>
  ) {}

  async analyze(resume: ResumeRecord, job: JobRecord): Promise<RelevanceAssessment> {
    let reply: ChatCompletionReply;
    try {
      reply = await this.completions.create({
        model: this.settings.model,
        messages: [
          { role: 'system', content: ANALYSIS_SYSTEM_PROMPT },
          { role: 'user', content: buildAnalysisPrompt(resume, job) }
        ],
        temperature: this.settings.temperature,
        max_tokens: this.settings.maxTokens
      });
    } catch (error) {
      throw new UpstreamError(`Chat completion request failed: ${describeError(error)}`, error);
    }

    return parseAnalysisReply(reply.choices[0]?.message.content);
  }
}

export const createOpenAiAnalyzer = (config: OpenAiConfig): OpenAiRelevanceAnalyzer => {
  const client = new OpenAI({ apiKey: config.apiKey });
  return new OpenAiRelevanceAnalyzer(client.chat.completions, {
    model: config.model,
    temperature: config.temperature,
    maxTokens: config.maxTokens
  });
};
