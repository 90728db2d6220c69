import { ConfigurationError } from '@/shared/errors/index.js'
import { LogLevel, logger } from '@/shared/logger/index.js'

/**
 * Configuration Factory
 * Environment-variable based server and agent settings
 */

export type EmbeddingProviderType = 'openai' | 'gemini' | 'ollama'
export type ChatProviderType = 'openai' | 'gemini' | 'ollama'
export type ChunkingStrategy = 'fixed' | 'recursive'
export type MCPTransportType = 'stdio' | 'streamable-http'

export interface MCPTransportConfig {
  type: MCPTransportType
  port: number
  host: string
  enableCors: boolean
  allowedOrigins: string[]
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderType
  openaiApiKey?: string
  openaiModel: string
  googleApiKey?: string
  geminiModel: string
  ollamaBaseUrl: string
  ollamaModel: string
  maxAttempts: number         // attempts per batch, first call included
  retryBaseDelayMs: number    // doubled after every failed attempt
  batchSize: number
  requestTimeoutMs: number
}

export interface SourcesConfig {
  requestTimeoutMs: number
  arxivBaseUrl: string
  semanticScholarBaseUrl: string
  semanticScholarApiKey?: string
  arxivFullText: boolean         // download each PDF and index its text
  arxivFullTextMaxChars: number  // 0 keeps the whole text
  pdfTimeoutMs: number
}

export interface AgentConfig {
  topic: string
  sources: string
  maxPapers: number
  question: string
  llmProvider: ChatProviderType
  openaiModel: string
  geminiModel: string
  ollamaChatModel: string
  temperature: number
  maxAttempts: number
  retryBaseDelayMs: number
  telegramBotToken?: string
  telegramChatId?: string
  serverCommand: string
  serverArgs: string[]
}

export interface ServerConfig {
  nodeEnv: string
  logLevel: LogLevel

  // Fragments
  chunkSize: number
  chunkOverlap: number
  chunkingStrategy: ChunkingStrategy

  // Retrieval
  similarityTopK: number
  deduplicateFragments: boolean
  defaultMaxPapers: number
  defaultSources: string

  embedding: EmbeddingConfig
  sources: SourcesConfig
  mcp: MCPTransportConfig
  agent: AgentConfig
}

export type ConfigOverrides = Partial<Omit<ServerConfig, 'embedding' | 'sources' | 'mcp' | 'agent'>> & {
  embedding?: Partial<EmbeddingConfig>
  sources?: Partial<SourcesConfig>
  mcp?: Partial<MCPTransportConfig>
  agent?: Partial<AgentConfig>
}

const EMBEDDING_PROVIDER_ALIASES: Record<string, EmbeddingProviderType> = {
  openai: 'openai',
  gemini: 'gemini',
  ollama: 'ollama',
  local: 'ollama',
}

const CHAT_PROVIDER_ALIASES: Record<string, ChatProviderType> = {
  openai: 'openai',
  gemini: 'gemini',
  ollama: 'ollama',
  'deepseek-local': 'ollama',
}

const DEFAULT_AGENT_QUESTION =
  'Which papers or research present significant technological innovations, performance improvements, or recent advances in AI, machine learning, or computing?'

function env(key: string): string | undefined {
  const value = process.env[key]
  return value === undefined || value.trim() === '' ? undefined : value.trim()
}

function intEnv(key: string, fallback: number): number {
  const raw = env(key)
  if (raw === undefined) return fallback
  const parsed = parseInt(raw, 10)
  return Number.isNaN(parsed) ? fallback : parsed
}

function floatEnv(key: string, fallback: number): number {
  const raw = env(key)
  if (raw === undefined) return fallback
  const parsed = parseFloat(raw)
  return Number.isNaN(parsed) ? fallback : parsed
}

function boolEnv(key: string, fallback: boolean): boolean {
  const raw = env(key)
  if (raw === undefined) return fallback
  return !['false', '0', 'no', 'off'].includes(raw.toLowerCase())
}

/**
 * Map a provider name (aliases included) onto its canonical type.
 * Unknown names are kept verbatim so that validation can report them.
 */
export function resolveEmbeddingProvider(raw: string): EmbeddingProviderType | string {
  const key = raw.toLowerCase()
  return EMBEDDING_PROVIDER_ALIASES[key] ?? key
}

export function resolveChatProvider(raw: string): ChatProviderType | string {
  const key = raw.toLowerCase()
  return CHAT_PROVIDER_ALIASES[key] ?? key
}

function isEmbeddingProvider(value: string): value is EmbeddingProviderType {
  return value === 'openai' || value === 'gemini' || value === 'ollama'
}

function isChatProvider(value: string): value is ChatProviderType {
  return value === 'openai' || value === 'gemini' || value === 'ollama'
}

function isChunkingStrategy(value: string): value is ChunkingStrategy {
  return value === 'fixed' || value === 'recursive'
}

function isTransportType(value: string): value is MCPTransportType {
  return value === 'stdio' || value === 'streamable-http'
}

function isLogLevel(value: string): value is LogLevel {
  return Object.values(LogLevel).some((level) => level === value)
}

export class ConfigFactory {
  /**
   * Settings for the current NODE_ENV
   */
  static getCurrentConfig(): ServerConfig {
    const nodeEnv = env('NODE_ENV') || 'development'

    if (nodeEnv === 'production') {
      return ConfigFactory.createProductionConfig()
    }
    return ConfigFactory.createDevelopmentConfig()
  }

  /**
   * Read every recognized variable. Names that are not recognized (providers,
   * strategy, transport, log level) throw here together, everything else is
   * checked by validateConfig.
   */
  private static createBaseConfig(): ServerConfig {
    const nodeEnv = env('NODE_ENV') || 'development'
    const embeddingProvider = resolveEmbeddingProvider(env('EMBEDDING_PROVIDER') || 'ollama')
    const llmProvider = resolveChatProvider(env('LLM_PROVIDER') || 'ollama')
    const chunkingStrategy = (env('CHUNKING_STRATEGY') || 'fixed').toLowerCase()
    const transport = (env('MCP_TRANSPORT') || 'stdio').toLowerCase()
    const logLevel = (env('LOG_LEVEL') || LogLevel.INFO).toLowerCase()

    const problems: string[] = []
    if (!isEmbeddingProvider(embeddingProvider)) {
      problems.push(`EMBEDDING_PROVIDER '${embeddingProvider}' not supported. Use: 'openai', 'gemini', or 'local'`)
    }
    if (!isChatProvider(llmProvider)) {
      problems.push(`LLM_PROVIDER '${llmProvider}' not supported. Use: 'openai', 'gemini', or 'deepseek-local'`)
    }
    if (!isChunkingStrategy(chunkingStrategy)) {
      problems.push(`CHUNKING_STRATEGY '${chunkingStrategy}' not supported. Use: 'fixed' or 'recursive'`)
    }
    if (!isTransportType(transport)) {
      problems.push(`MCP_TRANSPORT '${transport}' not supported. Use: 'stdio' or 'streamable-http'`)
    }
    if (!isLogLevel(logLevel)) {
      problems.push(`LOG_LEVEL '${logLevel}' not supported. Use: ${Object.values(LogLevel).join(', ')}`)
    }
    if (
      !isEmbeddingProvider(embeddingProvider) ||
      !isChatProvider(llmProvider) ||
      !isChunkingStrategy(chunkingStrategy) ||
      !isTransportType(transport) ||
      !isLogLevel(logLevel)
    ) {
      throw new ConfigurationError(
        `Configuration validation failed:\n${problems.join('\n')}`,
        'environment',
        problems
      )
    }

    return {
      nodeEnv,
      logLevel,

      chunkSize: intEnv('CHUNK_SIZE', 1000),
      chunkOverlap: intEnv('CHUNK_OVERLAP', 100),
      chunkingStrategy,

      similarityTopK: intEnv('SIMILARITY_TOP_K', 5),
      deduplicateFragments: boolEnv('DEDUPLICATE_FRAGMENTS', true),
      defaultMaxPapers: 10,
      defaultSources: 'arxiv,semantic_scholar',

      embedding: {
        provider: embeddingProvider,
        openaiApiKey: env('OPENAI_API_KEY'),
        openaiModel: env('OPENAI_EMBEDDING_MODEL') || 'text-embedding-3-small',
        googleApiKey: env('GOOGLE_API_KEY'),
        geminiModel: env('GEMINI_EMBEDDING_MODEL') || 'models/embedding-001',
        ollamaBaseUrl: env('OLLAMA_BASE_URL') || 'http://localhost:11434',
        ollamaModel: env('LOCAL_EMBEDDING_MODEL') || 'nomic-embed-text',
        maxAttempts: intEnv('EMBEDDING_MAX_ATTEMPTS', 3),
        retryBaseDelayMs: intEnv('EMBEDDING_RETRY_BASE_DELAY_MS', 2000),
        batchSize: intEnv('EMBEDDING_BATCH_SIZE', 32),
        requestTimeoutMs: intEnv('EMBEDDING_REQUEST_TIMEOUT_MS', 60000),
      },

      sources: {
        requestTimeoutMs: intEnv('SOURCE_REQUEST_TIMEOUT_MS', 10000),
        arxivBaseUrl: env('ARXIV_BASE_URL') || 'http://export.arxiv.org',
        semanticScholarBaseUrl: env('SEMANTIC_SCHOLAR_BASE_URL') || 'https://api.semanticscholar.org',
        semanticScholarApiKey: env('SEMANTIC_SCHOLAR_API_KEY'),
        arxivFullText: boolEnv('ARXIV_FULL_TEXT', true),
        arxivFullTextMaxChars: intEnv('ARXIV_FULL_TEXT_MAX_CHARS', 4000),
        pdfTimeoutMs: intEnv('ARXIV_PDF_TIMEOUT_MS', 30000),
      },

      mcp: {
        type: transport,
        port: intEnv('MCP_PORT', 3000),
        host: env('MCP_HOST') || 'localhost',
        enableCors: boolEnv('MCP_ENABLE_CORS', true),
        allowedOrigins: env('MCP_ALLOWED_ORIGINS')?.split(',').map((o) => o.trim()) || ['*'],
      },

      agent: {
        topic: env('TECH_NEWS_TOPIC') || 'artificial intelligence machine learning',
        sources: env('PAPER_SOURCES') || 'arxiv,semantic_scholar',
        maxPapers: intEnv('MAX_PAPERS', 15),
        question: env('AGENT_QUESTION') || DEFAULT_AGENT_QUESTION,
        llmProvider,
        openaiModel: env('OPENAI_MODEL') || 'gpt-4o-mini',
        geminiModel: env('GEMINI_MODEL') || 'gemini-1.5-flash',
        ollamaChatModel: env('OLLAMA_CHAT_MODEL') || env('DEEPSEEK_MODEL') || 'deepseek-r1:7b',
        temperature: floatEnv('LLM_TEMPERATURE', 0.7),
        maxAttempts: intEnv('LLM_MAX_ATTEMPTS', 3),
        retryBaseDelayMs: intEnv('LLM_RETRY_BASE_DELAY_MS', 2000),
        telegramBotToken: env('TELEGRAM_BOT_TOKEN'),
        telegramChatId: env('TELEGRAM_CHAT_ID'),
        serverCommand: env('RAG_SERVER_COMMAND') || process.execPath,
        serverArgs: env('RAG_SERVER_ARGS')?.split(' ') || [],
      },
    }
  }

  static createDevelopmentConfig(): ServerConfig {
    const baseConfig = ConfigFactory.createBaseConfig()

    return {
      ...baseConfig,
      nodeEnv: 'development',
      logLevel: env('LOG_LEVEL') ? baseConfig.logLevel : LogLevel.DEBUG,
    }
  }

  static createProductionConfig(): ServerConfig {
    const baseConfig = ConfigFactory.createBaseConfig()

    return {
      ...baseConfig,
      nodeEnv: 'production',
    }
  }

  /**
   * Deterministic settings for tests: never reads the environment
   */
  static createTestConfig(overrides: ConfigOverrides = {}): ServerConfig {
    const base: ServerConfig = {
      nodeEnv: 'test',
      logLevel: LogLevel.SILENT,
      chunkSize: 1000,
      chunkOverlap: 100,
      chunkingStrategy: 'fixed',
      similarityTopK: 5,
      deduplicateFragments: true,
      defaultMaxPapers: 10,
      defaultSources: 'arxiv,semantic_scholar',
      embedding: {
        provider: 'ollama',
        openaiModel: 'text-embedding-3-small',
        geminiModel: 'models/embedding-001',
        ollamaBaseUrl: 'http://localhost:11434',
        ollamaModel: 'nomic-embed-text',
        maxAttempts: 3,
        retryBaseDelayMs: 1,
        batchSize: 32,
        requestTimeoutMs: 1000,
      },
      sources: {
        requestTimeoutMs: 1000,
        arxivBaseUrl: 'http://arxiv.test',
        semanticScholarBaseUrl: 'https://semanticscholar.test',
        arxivFullText: false,
        arxivFullTextMaxChars: 4000,
        pdfTimeoutMs: 1000,
      },
      mcp: {
        type: 'stdio',
        port: 3000,
        host: 'localhost',
        enableCors: false,
        allowedOrigins: ['*'],
      },
      agent: {
        topic: 'test topic',
        sources: 'arxiv,semantic_scholar',
        maxPapers: 15,
        question: DEFAULT_AGENT_QUESTION,
        llmProvider: 'ollama',
        openaiModel: 'gpt-4o-mini',
        geminiModel: 'gemini-1.5-flash',
        ollamaChatModel: 'deepseek-r1:7b',
        temperature: 0.7,
        maxAttempts: 3,
        retryBaseDelayMs: 1,
        serverCommand: 'node',
        serverArgs: [],
      },
    }

    const { embedding, sources, mcp, agent, ...rest } = overrides
    return {
      ...base,
      ...rest,
      embedding: { ...base.embedding, ...embedding },
      sources: { ...base.sources, ...sources },
      mcp: { ...base.mcp, ...mcp },
      agent: { ...base.agent, ...agent },
    }
  }

  /**
   * Collect every problem and throw them together
   */
  static validateConfig(config: ServerConfig): void {
    const errors: string[] = []

    if (config.chunkSize < 1) {
      errors.push('Chunk size must be at least 1')
    }

    if (config.chunkOverlap < 0 || config.chunkOverlap >= config.chunkSize) {
      errors.push('Chunk overlap must be between 0 and chunk size (exclusive)')
    }

    if (config.similarityTopK < 1) {
      errors.push('Similarity top-k must be at least 1')
    }

    const { embedding } = config
    if (embedding.maxAttempts < 1) {
      errors.push('Embedding max attempts must be at least 1')
    }
    if (embedding.retryBaseDelayMs < 0) {
      errors.push('Embedding retry base delay must not be negative')
    }
    if (embedding.batchSize < 1) {
      errors.push('Embedding batch size must be at least 1')
    }
    if (embedding.provider === 'openai' && !embedding.openaiApiKey) {
      errors.push('OPENAI_API_KEY is required when EMBEDDING_PROVIDER=openai')
    }
    if (embedding.provider === 'gemini' && !embedding.googleApiKey) {
      errors.push('GOOGLE_API_KEY is required when EMBEDDING_PROVIDER=gemini')
    }
    if (embedding.provider === 'ollama' && !embedding.ollamaBaseUrl) {
      errors.push('Ollama base URL is required')
    }

    if (config.sources.requestTimeoutMs < 1) {
      errors.push('Source request timeout must be positive')
    }
    if (config.sources.arxivFullText && config.sources.pdfTimeoutMs < 1) {
      errors.push('arXiv PDF timeout must be positive')
    }
    if (config.sources.arxivFullTextMaxChars < 0) {
      errors.push('arXiv full-text limit must not be negative')
    }

    if (config.mcp.type === 'streamable-http') {
      if (config.mcp.port < 1 || config.mcp.port > 65535) {
        errors.push('MCP port must be between 1 and 65535')
      }
      if (!config.mcp.host) {
        errors.push('MCP host is required for HTTP transport')
      }
    }

    if (errors.length > 0) {
      throw new ConfigurationError(
        `Configuration validation failed:\n${errors.join('\n')}`,
        'server',
        errors
      )
    }

    logger.debug('✅ Configuration validation passed', {
      embeddingProvider: embedding.provider,
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
      mcpTransport: config.mcp.type,
    })
  }

  /**
   * Checks that only matter to the agent client
   */
  static validateAgentConfig(config: ServerConfig): void {
    const errors: string[] = []
    const { agent } = config

    if (!agent.topic) {
      errors.push('TECH_NEWS_TOPIC must not be empty')
    }
    if (agent.maxPapers < 1) {
      errors.push('MAX_PAPERS must be at least 1')
    }
    if (agent.llmProvider === 'openai' && !config.embedding.openaiApiKey) {
      errors.push('OPENAI_API_KEY is required when LLM_PROVIDER=openai')
    }
    if (agent.llmProvider === 'gemini' && !config.embedding.googleApiKey) {
      errors.push('GOOGLE_API_KEY is required when LLM_PROVIDER=gemini')
    }

    if (errors.length > 0) {
      throw new ConfigurationError(
        `Agent configuration validation failed:\n${errors.join('\n')}`,
        'agent',
        errors
      )
    }
  }
}
