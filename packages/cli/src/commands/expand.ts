/**
 * expand 커맨드
 * 노드의 직접 이웃 중 아직 보이지 않는 요소만 출력합니다
 * 사용법: hiergraph expand ./org.csv Bob --visible Bob,TeamA
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { VisibilityState } from '@hiergraph/core';
import { formatLink, formatNode, formatVisibleFlags, toJson } from '../utils/output';
import { parseLabels } from '../utils/options';
import { exitWithError, loadGraphWithSpinner } from '../utils/graph';

interface ExpandCommandOptions {
  rel?: string[];
  visible?: string[];
  visibleEdges?: string[];
  json?: boolean;
}

export function createExpandCommand(): Command {
  return new Command('expand')
    .description('노드의 이웃을 확장해 새로 드러난 요소를 출력합니다')
    .argument('<file>', '입력 테이블 (.csv | .json | .xlsx)')
    .argument('<node>', '확장할 노드')
    .option('--rel <labels>', '따라갈 relationship (comma-separated)', parseLabels)
    .option('--visible <ids>', '이미 보이는 노드 (comma-separated)', parseLabels)
    .option('--visible-edges <keys>', '이미 보이는 엣지 키 (comma-separated)', parseLabels)
    .option('--json', '결과를 JSON으로 출력')
    .action((file: string, node: string, options: ExpandCommandOptions) => {
      try {
        const { engine } = loadGraphWithSpinner(file);
        const state = VisibilityState.from({
          nodes: options.visible ?? [],
          edges: options.visibleEdges ?? [],
        });
        const delta = engine.expand(node, {
          ...(options.rel !== undefined ? { visibleRelationships: options.rel } : {}),
          alreadyVisible: state,
        });

        if (options.json) {
          process.stdout.write(toJson(delta));
          return;
        }

        console.log('');
        if (delta.nodes.length === 0 && delta.links.length === 0) {
          console.log(chalk.dim('  새로 드러난 요소가 없습니다.'));
          return;
        }
        for (const item of delta.nodes) {
          console.log(chalk.green(`  + ${formatNode(item)}`));
        }
        for (const link of delta.links) {
          console.log(chalk.green(`  + ${formatLink(link)}`));
          console.log(chalk.dim(`      ${link.id}`));
        }

        // 다음 확장에 그대로 넘길 수 있는 누적 가시 집합
        state.absorb(delta);
        console.log('');
        for (const line of formatVisibleFlags(state.snapshot())) {
          console.log(chalk.dim(`  ${line}`));
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}
