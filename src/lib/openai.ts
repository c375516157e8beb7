import OpenAI from 'openai';
import Groq from 'groq-sdk';
import { env } from '../config/env';
import { logger } from './logger';

export function createOpenAIClient(): OpenAI {
  if (!env.OPENAI_API_KEY) {
    logger.warn('OPENAI_API_KEY not configured - OpenAI calls will fail');
  }

  return new OpenAI({
    apiKey: env.OPENAI_API_KEY ?? 'missing-key',
    maxRetries: 1,
  });
}

export function createGroqClient(): Groq {
  if (!env.GROQ_API_KEY) {
    logger.warn('GROQ_API_KEY not configured - Groq transcription will fail');
  }

  return new Groq({
    apiKey: env.GROQ_API_KEY ?? 'missing-key',
    maxRetries: 1,
  });
}
