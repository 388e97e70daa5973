/**
 * paths 커맨드
 * 두 노드 사이의 모든 단순 경로를 출력합니다
 * 사용법: hiergraph paths ./org.csv Project1 TeamA [--max-depth 4]
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { formatPath } from '../utils/output';
import { parseDepth } from '../utils/options';
import { exitWithError, loadGraphWithSpinner } from '../utils/graph';

export function createPathsCommand(): Command {
  return new Command('paths')
    .description('두 노드 사이의 단순 경로를 나열합니다')
    .argument('<file>', '입력 테이블 (.csv | .json | .xlsx)')
    .argument('<from>', '시작 노드')
    .argument('<to>', '끝 노드')
    .option('--max-depth <n>', '경로 최대 엣지 수', parseDepth)
    .action((file: string, from: string, to: string, options: { maxDepth?: number }) => {
      try {
        const { engine } = loadGraphWithSpinner(file);
        const { paths, truncated } = engine.paths(from, to, options.maxDepth);

        console.log('');
        if (paths.length === 0) {
          console.log(chalk.yellow(`  ${from} 와 ${to} 사이에 경로가 없습니다.`));
          return;
        }

        console.log(chalk.bold(`  경로 ${paths.length}개`));
        for (const path of paths) {
          console.log(`    ${formatPath(path)}`);
        }
        if (truncated) {
          console.log(chalk.yellow('  경로 수 한도에 도달해 나머지는 생략했습니다.'));
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}
