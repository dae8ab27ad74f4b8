import OpenAI from 'openai';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { ScorerConfig, TransportConfig } from '../types/models';

/**
 * Pick the proxy for the provider endpoint. The API is served over HTTPS,
 * so HTTPS_PROXY takes precedence.
 */
export function resolveProxyUrl(transport: TransportConfig): string | undefined {
  return transport.httpsProxy ?? transport.httpProxy;
}

/**
 * Create an OpenAI client from the scorer configuration
 */
export function createOpenAIClient(config: ScorerConfig): OpenAI {
  const proxyUrl = resolveProxyUrl(config.transport);

  return new OpenAI({
    apiKey: config.openaiApiKey,
    timeout: config.transport.timeoutMs,
    maxRetries: config.transport.maxRetries,
    ...(proxyUrl ? { httpAgent: new HttpsProxyAgent(proxyUrl) } : {})
  });
}
