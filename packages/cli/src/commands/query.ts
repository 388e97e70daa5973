/**
 * query 커맨드
 * 노드/경로/관계/kind 필터를 적용한 가시성 결과를 출력합니다
 * 사용법: hiergraph query ./org.csv --from Bob --to TeamA --rel reports_to
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { summarizeView } from '@hiergraph/core';
import type { NodeKind, QueryOptions } from '@hiergraph/shared';
import { formatLink, formatNode, formatPath, formatSummary, toJson } from '../utils/output';
import { parseDepth, parseKinds, parseLabels } from '../utils/options';
import { exitWithError, loadGraphWithSpinner } from '../utils/graph';

interface QueryCommandOptions {
  node?: string;
  from?: string;
  to?: string;
  rel?: string[];
  kind?: NodeKind[];
  maxDepth?: number;
  json?: boolean;
  output?: string;
}

/** 커맨드 옵션 → QueryOptions */
export function toQueryOptions(options: QueryCommandOptions): QueryOptions {
  return {
    ...(options.node !== undefined ? { filterNode: options.node } : {}),
    ...(options.from !== undefined ? { pathStart: options.from } : {}),
    ...(options.to !== undefined ? { pathEnd: options.to } : {}),
    ...(options.rel !== undefined ? { visibleRelationships: options.rel } : {}),
    ...(options.kind !== undefined ? { visibleKinds: options.kind } : {}),
    ...(options.maxDepth !== undefined ? { maxDepth: options.maxDepth } : {}),
  };
}

export function createQueryCommand(): Command {
  return new Command('query')
    .description('필터를 적용해 노드/링크 가시성을 계산합니다')
    .argument('<file>', '입력 테이블 (.csv | .json | .xlsx)')
    .option('-n, --node <id>', '노드 필터 (자신 + 직접 이웃)')
    .option('--from <id>', '경로 시작 노드')
    .option('--to <id>', '경로 끝 노드')
    .option('--rel <labels>', '표시할 relationship (comma-separated)', parseLabels)
    .option('--kind <kinds>', '표시할 kind (comma-separated)', parseKinds)
    .option('--max-depth <n>', '경로 최대 엣지 수', parseDepth)
    .option('--json', '전체 결과를 JSON으로 출력')
    .option('-o, --output <path>', 'JSON 결과 파일 경로')
    .action((file: string, options: QueryCommandOptions) => {
      try {
        const { engine } = loadGraphWithSpinner(file);
        const view = engine.query(toQueryOptions(options));

        if (options.output) {
          const outputPath = resolve(options.output);
          writeFileSync(outputPath, toJson(view), 'utf-8');
          console.log(chalk.dim(`  파일: ${outputPath}`));
          return;
        }
        if (options.json) {
          process.stdout.write(toJson(view));
          return;
        }

        console.log('');
        for (const line of formatSummary(summarizeView(view))) {
          console.log(chalk.bold(`  ${line}`));
        }
        if (view.truncated) {
          console.log(chalk.yellow('  경로 수 한도에 도달해 일부 경로만 반영했습니다.'));
        }
        for (const path of view.paths ?? []) {
          console.log(chalk.cyan(`    ${formatPath(path)}`));
        }

        console.log('');
        for (const node of view.nodes) {
          const line = `    ${formatNode(node)}`;
          console.log(node.visible ? line : chalk.dim(line));
        }
        for (const link of view.links) {
          const line = `    ${formatLink(link)}`;
          console.log(link.visible ? line : chalk.dim(line));
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}
