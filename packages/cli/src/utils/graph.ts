/**
 * 커맨드 공용 - 테이블 로드 + 에러 종료
 */
import chalk from 'chalk';
import ora from 'ora';
import { resolve } from 'node:path';
import { loadGraph, type LoadedGraph } from '@hiergraph/core';
import { formatError } from './output';

/** 스피너와 함께 그래프 로드 (스피너는 stderr에 출력) */
export function loadGraphWithSpinner(file: string): LoadedGraph {
  const filePath = resolve(file);
  const spinner = ora(`테이블 로드 중: ${filePath}`).start();

  try {
    const loaded = loadGraph(filePath);
    spinner.succeed(
      chalk.green(`로드 완료: 노드 ${loaded.store.order}개, 엣지 ${loaded.store.size}개`),
    );
    return loaded;
  } catch (error) {
    spinner.fail(chalk.red('로드 실패'));
    throw error;
  }
}

/** 에러 출력 후 종료 코드 1 */
export function exitWithError(error: unknown): never {
  console.error(chalk.red(formatError(error)));
  process.exit(1);
}
