import { join } from 'node:path';
import dotenv from 'dotenv';
import { addLog } from './logger.js';

export interface LoadEnvOptions {
  /** Also require the web search credential (five-whys with search enabled). */
  requireSearch?: boolean;
  homeDir?: string;
}

const loadEnvFile = (filePath: string, options?: { override?: boolean }) => {
  dotenv.config({
    path: filePath,
    override: options?.override ?? false,
  });
};

export const loadEnv = (workspacePath?: string, options: LoadEnvOptions = {}) => {
  if (workspacePath && workspacePath.trim().length > 0) {
    loadEnvFile(join(workspacePath, '.insight', '.env.local'));
  }

  const homeDir = options.homeDir ?? process.env.HOME ?? process.env.USERPROFILE;
  if (homeDir) {
    loadEnvFile(join(homeDir, '.insight', '.env.local'));
  }

  loadEnvFile('.env.local');
  loadEnvFile('.env');

  const missingEnvVars: string[] = [];

  const hasOpenRouter = !!process.env.OPENROUTER_API_KEY;
  const hasOpenAI = !!process.env.OPENAI_API_KEY;

  if (!hasOpenRouter && !hasOpenAI) {
    missingEnvVars.push('OPENROUTER_API_KEY or OPENAI_API_KEY');
  }

  if (hasOpenRouter && !process.env.OPENROUTER_MODEL_NAME) {
    missingEnvVars.push('OPENROUTER_MODEL_NAME');
  }

  if (!hasOpenRouter && hasOpenAI && !process.env.OPENAI_MODEL_NAME) {
    missingEnvVars.push('OPENAI_MODEL_NAME');
  }

  if (options.requireSearch && !process.env.TAVILY_API_KEY) {
    missingEnvVars.push('TAVILY_API_KEY');
  }

  if (missingEnvVars.length > 0) {
    addLog(`[Env] Missing variables: ${missingEnvVars.join(', ')}`);
    throw new Error(`Missing required environment variables: ${missingEnvVars.join(', ')}`);
  }
};
