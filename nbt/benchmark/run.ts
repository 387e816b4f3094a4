import { formatSummary, runBenchmark } from './runner.js';

// Entrypoint for `npm run bench`
function main(): void {
  console.log(`Node ${process.version} ${process.platform} ${process.arch}`);
  console.log('');
  console.log(formatSummary(runBenchmark({ iterations: 7 })));
}

try {
  main();
} catch (error) {
  console.error('Benchmark failed:', error);
  process.exit(1);
}
