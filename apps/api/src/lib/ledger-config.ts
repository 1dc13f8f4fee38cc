import { z } from 'zod';
import { parseUnits } from '@repo/core';

export type PriceFeedConfig =
  | { mode: 'fixed'; rate: bigint; decimals: number }
  | { mode: 'chainlink'; feedAddress: `0x${string}`; rpcUrl: string; decimals: number };

/** Tokens minted to an account and approved for custody at startup */
export type TokenGrant = { account: string; amount: bigint };

export type LedgerConfig = {
  port: number;
  depositCap: bigint;
  custodyAccount: string;
  priceFeed: PriceFeedConfig;
  tokenGrants: TokenGrant[];
};

// account=amount pairs, comma separated: "alice=1000,bob=250"
const TOKEN_GRANTS_PATTERN = /^[^=,\s]+=\d+(?:,[^=,\s]+=\d+)*$/;

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    LEDGER_DEPOSIT_CAP: z
      .string({ required_error: 'LEDGER_DEPOSIT_CAP is required' })
      .regex(/^\d+$/, 'LEDGER_DEPOSIT_CAP must be a whole number of reference units'),
    LEDGER_CUSTODY_ACCOUNT: z.string().min(1).default('ledger'),
    PRICE_FEED_MODE: z.enum(['fixed', 'chainlink']).default('fixed'),
    PRICE_FEED_RATE: z.string().optional(),
    PRICE_FEED_DECIMALS: z.coerce.number().int().min(0).max(36).default(8),
    PRICE_FEED_ADDRESS: z
      .string()
      .regex(/^0x[0-9a-fA-F]{40}$/, 'PRICE_FEED_ADDRESS must be a 20-byte hex address')
      .optional(),
    RPC_URL: z.string().url().optional(),
    LEDGER_TOKEN_GRANTS: z
      .string()
      .transform((value) => value.replace(/\s+/g, ''))
      .pipe(
        z
          .string()
          .regex(TOKEN_GRANTS_PATTERN, 'LEDGER_TOKEN_GRANTS must look like "alice=1000,bob=250"')
      )
      .optional(),
  })
  .superRefine((env, ctx) => {
    if (env.PRICE_FEED_MODE === 'fixed' && !env.PRICE_FEED_RATE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PRICE_FEED_RATE'],
        message: 'PRICE_FEED_RATE is required when PRICE_FEED_MODE=fixed',
      });
    }
    if (env.PRICE_FEED_MODE === 'chainlink') {
      if (!env.PRICE_FEED_ADDRESS) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['PRICE_FEED_ADDRESS'],
          message: 'PRICE_FEED_ADDRESS is required when PRICE_FEED_MODE=chainlink',
        });
      }
      if (!env.RPC_URL) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['RPC_URL'],
          message: 'RPC_URL is required when PRICE_FEED_MODE=chainlink',
        });
      }
    }
  });

function isHexAddress(value: string): value is `0x${string}` {
  return value.startsWith('0x');
}

/**
 * Load ledger settings from the environment.
 * Throws one Error listing every invalid or missing variable.
 */
export function loadLedgerConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const key = issue.path.join('.');
      return key ? `${key}: ${issue.message}` : issue.message;
    });
    throw new Error(`Invalid ledger configuration:\n  - ${issues.join('\n  - ')}`);
  }

  const values = parsed.data;
  let priceFeed: PriceFeedConfig;

  if (values.PRICE_FEED_MODE === 'chainlink') {
    const feedAddress = values.PRICE_FEED_ADDRESS ?? '';
    if (!isHexAddress(feedAddress) || !values.RPC_URL) {
      throw new Error('Invalid ledger configuration: chainlink feed is incomplete');
    }
    priceFeed = {
      mode: 'chainlink',
      feedAddress,
      rpcUrl: values.RPC_URL,
      decimals: values.PRICE_FEED_DECIMALS,
    };
  } else {
    let rate: bigint;
    try {
      rate = parseUnits(values.PRICE_FEED_RATE ?? '', values.PRICE_FEED_DECIMALS);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid ledger configuration:\n  - PRICE_FEED_RATE: ${reason}`, {
        cause: error,
      });
    }
    if (rate <= 0n) {
      throw new Error('Invalid ledger configuration:\n  - PRICE_FEED_RATE: must be positive');
    }
    priceFeed = { mode: 'fixed', rate, decimals: values.PRICE_FEED_DECIMALS };
  }

  return {
    port: values.PORT,
    tokenGrants: parseTokenGrants(values.LEDGER_TOKEN_GRANTS),
    depositCap: BigInt(values.LEDGER_DEPOSIT_CAP),
    custodyAccount: values.LEDGER_CUSTODY_ACCOUNT,
    priceFeed,
  };
}

function parseTokenGrants(value: string | undefined): TokenGrant[] {
  if (!value) {
    return [];
  }
  return value.split(',').map((pair) => {
    const [account = '', amount = '0'] = pair.split('=');
    return { account, amount: BigInt(amount) };
  });
}
