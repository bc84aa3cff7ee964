import { z } from 'zod';

const envSchema = z.object({
  FINNHUB_API_KEY: z.string().optional(),
  NEXT_PUBLIC_FINNHUB_API_KEY: z.string().optional(),
  FINNHUB_BASE_URL: z.string().url().default('https://finnhub.io/api/v1'),
  DEFAULT_RISK_FREE_RATE: z.coerce.number().finite().default(0.05),
});

export type ServerConfig = {
  finnhubApiKey: string;
  finnhubBaseUrl: string;
  defaultRiskFreeRate: number;
};

/** A bad environment throws a plain Error, which the routes report as an internal failure. */
export const getServerConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid server configuration (${problems})`, { cause: result.error });
  }
  const parsed = result.data;
  return {
    finnhubApiKey: parsed.FINNHUB_API_KEY || parsed.NEXT_PUBLIC_FINNHUB_API_KEY || '',
    finnhubBaseUrl: parsed.FINNHUB_BASE_URL.replace(/\/$/, ''),
    defaultRiskFreeRate: parsed.DEFAULT_RISK_FREE_RATE,
  };
};
