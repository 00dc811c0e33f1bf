import 'dotenv/config';
import z from 'zod';
import process from 'node:process';
import { omit } from 'lodash';
import { NetworkType } from './constants';

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.string().optional(),
  ADDRESS: z.string().optional(),
  NETWORK: z.nativeEnum(NetworkType).default(NetworkType.testnet),
  LOGGER_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  /**
   * The URL of the CKB light client JSON-RPC server.
   * https://github.com/nervosnetwork/ckb-light-client
   */
  CKB_LIGHT_CLIENT_RPC_URL: z.string().default('http://127.0.0.1:9000'),

  /**
   * Transaction fee rate in shannons per 1000 bytes
   */
  FEE_RATE: z.coerce.number().int().nonnegative().default(1000),
  /**
   * Change smaller than this (in shannons) is paid as fee instead of requiring
   * more inputs for a change cell. 1 CKB by default.
   */
  SMALL_CHANGE_AS_FEE: z.coerce.number().int().nonnegative().default(10 ** 8),
  /**
   * Page size used when draining live cells from the light client
   */
  CELL_QUERY_PAGE_SIZE: z.coerce.number().int().positive().default(100),

  /**
   * Private keys of the accounts this service signs for, separated by comma.
   */
  WALLET_PRIVATE_KEYS: z
    .string()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((key) => key.trim())
        .filter((key) => key.length > 0),
    )
    .pipe(z.string().regex(/^0x[0-9a-fA-F]{64}$/).array()),
  /**
   * Directory of encrypted keystore files, named `*--<account lock args>`
   */
  KEYSTORE_DIR: z.string().optional(),

  /**
   * Sentry Configuration
   */
  SENTRY_DSN_URL: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().default(0.5),
});

export type Env = z.infer<typeof envSchema>;
export const env = envSchema.parse(process.env);

export const getSafeEnvs = () => omit(env, ['WALLET_PRIVATE_KEYS']);
