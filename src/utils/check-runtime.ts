import chalk from 'chalk';

const MIN_NODE_MAJOR = 20;

export function checkRuntime(): void {
  const major = Number(process.versions.node.split('.')[0]);
  if (major < MIN_NODE_MAJOR) {
    console.error('');
    console.error(chalk.red.bold(`❌ Node.js ${MIN_NODE_MAJOR} or newer is required to run crate`));
    console.error('');
    console.error(chalk.gray(`Found Node.js ${process.versions.node}.`));
    console.error('');
    console.error(chalk.dim('Install a current release from: https://nodejs.org'));
    console.error('');
    process.exit(1);
  }
}
