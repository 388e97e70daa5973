#!/usr/bin/env tsx
/**
 * hiergraph CLI 메인 진입점
 * Commander.js 기반 CLI 구성
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { createInspectCommand } from './commands/inspect';
import { createQueryCommand } from './commands/query';
import { createPathsCommand } from './commands/paths';
import { createExpandCommand } from './commands/expand';

const program = new Command();

program
  .name('hiergraph')
  .description(
    chalk.bold('hiergraph') +
      ': 계층 테이블 그래프 탐색 도구\n' +
      chalk.dim('노드/경로/관계 필터로 가시성을 계산하고 이웃을 확장합니다.'),
  )
  .version('0.1.0', '-v, --version', '버전 출력');

// 커맨드 등록
program.addCommand(createInspectCommand());
program.addCommand(createQueryCommand());
program.addCommand(createPathsCommand());
program.addCommand(createExpandCommand());

// 알 수 없는 커맨드 처리
program.on('command:*', (operands: string[]) => {
  console.error(chalk.red(`알 수 없는 커맨드: ${operands.join(' ')}`));
  console.log(chalk.dim('hiergraph --help 를 실행하여 사용법을 확인하세요.'));
  process.exit(1);
});

program.parse(process.argv);

// 커맨드 없이 실행 시 help 출력
if (process.argv.length <= 2) {
  program.help();
}
