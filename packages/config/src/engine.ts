/**
 * 엔진 설정 - 환경 변수 기반
 * 값이 없으면 DEFAULTS로 대체, 잘못된 값은 즉시 ConfigError
 */
import { z } from 'zod';
import { DEFAULTS, HiergraphError } from '@hiergraph/shared';
import type { KindSizeMap } from '@hiergraph/shared';

export class ConfigError extends HiergraphError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
  }
}

export interface EngineConfig {
  kindSizes: KindSizeMap;
  /** 경로 최대 엣지 수 (없으면 무제한) */
  maxPathDepth?: number;
  /** 경로 열거 최대 개수 (없으면 무제한) */
  maxPaths?: number;
}

type Env = Record<string, string | undefined>;

const positiveNumber = z.coerce.number().finite().positive();
const positiveInt = z.coerce.number().int().positive();

function readEnv<T>(env: Env, name: string, schema: z.ZodType<T>): T | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const parsed = schema.safeParse(raw.trim());
  if (!parsed.success) {
    throw new ConfigError(`Environment variable ${name} is invalid: ${raw}`);
  }
  return parsed.data;
}

/** 기본 설정 (환경 변수 미사용) */
export function defaultEngineConfig(): EngineConfig {
  return {
    kindSizes: {
      lead: DEFAULTS.SIZE_LEAD,
      member: DEFAULTS.SIZE_MEMBER,
      child: DEFAULTS.SIZE_CHILD,
    },
  };
}

/**
 * 환경 변수에서 엔진 설정 로드
 * HIERGRAPH_SIZE_{LEAD,MEMBER,CHILD}, HIERGRAPH_MAX_PATH_DEPTH, HIERGRAPH_MAX_PATHS
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const config = defaultEngineConfig();

  config.kindSizes.lead =
    readEnv(env, 'HIERGRAPH_SIZE_LEAD', positiveNumber) ?? config.kindSizes.lead;
  config.kindSizes.member =
    readEnv(env, 'HIERGRAPH_SIZE_MEMBER', positiveNumber) ?? config.kindSizes.member;
  config.kindSizes.child =
    readEnv(env, 'HIERGRAPH_SIZE_CHILD', positiveNumber) ?? config.kindSizes.child;

  const maxPathDepth = readEnv(env, 'HIERGRAPH_MAX_PATH_DEPTH', positiveInt);
  if (maxPathDepth !== undefined) config.maxPathDepth = maxPathDepth;

  const maxPaths = readEnv(env, 'HIERGRAPH_MAX_PATHS', positiveInt);
  if (maxPaths !== undefined) config.maxPaths = maxPaths;

  return config;
}
