/**
 * Production container — uses real Supabase and the configured model providers.
 * Built once per process; `disposeProductionContainer` flushes logs and
 * drops it.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig, type Env, type PipelineConfig } from './config.js';
import { getSupabaseClient } from './db.js';
import { SupabaseChunkRepository } from './repositories/SupabaseChunkRepository.js';
import { SupabaseDocumentRepository } from './repositories/SupabaseDocumentRepository.js';
import { SupabaseInheritanceRepository } from './repositories/SupabaseInheritanceRepository.js';
import { SupabaseControlRepository } from './repositories/SupabaseControlRepository.js';
import { SupabaseEvidenceRepository } from './repositories/SupabaseEvidenceRepository.js';
import { SupabaseAssessmentRepository } from './repositories/SupabaseAssessmentRepository.js';
import { SupabaseFindingRepository } from './repositories/SupabaseFindingRepository.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { IReasoningProvider } from './providers/IReasoningProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import { OpenAIEmbeddingProvider } from './providers/OpenAIEmbeddingProvider.js';
import { VoyageEmbeddingProvider } from './providers/VoyageEmbeddingProvider.js';
import { LocalEmbeddingProvider } from './providers/LocalEmbeddingProvider.js';
import { OpenAIReasoningProvider } from './providers/OpenAIReasoningProvider.js';
import { AnthropicReasoningProvider } from './providers/AnthropicReasoningProvider.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { SupabaseRateLimitStore } from './stores/SupabaseRateLimitStore.js';

let cached: Container | null = null;

export function getProductionContainer(env: Env = process.env): Container {
  if (cached) return cached;

  const config = loadConfig(env);
  const { supabaseUrl, supabaseServiceRoleKey } = config.secrets;

  if (!supabaseUrl || !supabaseServiceRoleKey) {
    throw new Error(
      'Missing required environment variables: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY'
    );
  }

  const db = getSupabaseClient(supabaseUrl, supabaseServiceRoleKey);

  cached = createContainer(
    {
      chunkRepo: new SupabaseChunkRepository(db),
      documentRepo: new SupabaseDocumentRepository(db),
      inheritanceRepo: new SupabaseInheritanceRepository(db),
      controlRepo: new SupabaseControlRepository(db),
      evidenceRepo: new SupabaseEvidenceRepository(db),
      assessmentRepo: new SupabaseAssessmentRepository(db),
      findingRepo: new SupabaseFindingRepository(db),
      embeddingProvider: createEmbeddingProvider(config),
      reasoningProvider: createReasoningProvider(config),
      logProvider: createLogProvider(config),
      rateLimitStore: new SupabaseRateLimitStore(db),
    },
    config
  );

  return cached;
}

/** Flush buffered logs and forget the cached container. */
export async function disposeProductionContainer(): Promise<void> {
  if (!cached) return;
  const { logProvider } = cached;
  cached = null;

  if (logProvider instanceof AxiomLogProvider) {
    await logProvider.dispose();
  } else {
    await logProvider.flush();
  }
}

function createEmbeddingProvider(config: PipelineConfig): IEmbeddingProvider {
  const { provider, model, dimensions } = config.embedding;
  const secrets = config.secrets;

  switch (provider) {
    case 'openai':
      requireSecret(secrets.openaiApiKey, 'OPENAI_API_KEY');
      return new OpenAIEmbeddingProvider({ apiKey: secrets.openaiApiKey, model, dimensions });
    case 'voyage':
      requireSecret(secrets.voyageApiKey, 'VOYAGE_API_KEY');
      return new VoyageEmbeddingProvider({ apiKey: secrets.voyageApiKey, model, dimensions });
    case 'local':
      return new LocalEmbeddingProvider({ dimensions });
  }
}

function createReasoningProvider(config: PipelineConfig): IReasoningProvider {
  const { provider, model } = config.reasoning;
  const secrets = config.secrets;

  switch (provider) {
    case 'openai':
      requireSecret(secrets.openaiApiKey, 'OPENAI_API_KEY');
      return new OpenAIReasoningProvider({ apiKey: secrets.openaiApiKey, model });
    case 'anthropic':
      requireSecret(secrets.anthropicApiKey, 'ANTHROPIC_API_KEY');
      return new AnthropicReasoningProvider({ apiKey: secrets.anthropicApiKey, model });
  }
}

// Axiom logging when configured, console otherwise.
function createLogProvider(config: PipelineConfig): ILogProvider {
  const { axiomApiKey, axiomDataset } = config.secrets;
  return axiomApiKey && axiomDataset
    ? new AxiomLogProvider({
        apiToken: axiomApiKey,
        dataset: axiomDataset,
        service: 'evidence-pipeline',
      })
    : new ConsoleLogProvider({ outputToConsole: true, minLevel: 'info' });
}

function requireSecret(value: string | undefined, name: string): void {
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
}
