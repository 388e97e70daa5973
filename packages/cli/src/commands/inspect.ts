/**
 * inspect 커맨드
 * 테이블을 로드해 노드 목록과 relationship 종류를 출력합니다
 * 사용법: hiergraph inspect ./org.csv
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { formatNode } from '../utils/output';
import { exitWithError, loadGraphWithSpinner } from '../utils/graph';

export function createInspectCommand(): Command {
  return new Command('inspect')
    .description('테이블을 로드하고 노드/관계 목록을 출력합니다')
    .argument('<file>', '입력 테이블 (.csv | .json | .xlsx)')
    .action((file: string) => {
      try {
        const { store } = loadGraphWithSpinner(file);

        console.log('');
        console.log(chalk.dim(`  노드 ${store.order}개, 엣지 ${store.size}개`));
        console.log(chalk.bold(`  Nodes (${store.order})`));
        for (const node of store.nodes()) {
          console.log(`    ${formatNode(node)}`);
        }

        const relationships = store.relationshipTypes();
        console.log('');
        console.log(chalk.bold(`  Relationships (${relationships.length})`));
        for (const label of relationships) {
          console.log(chalk.cyan(`    ${label}`));
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}
