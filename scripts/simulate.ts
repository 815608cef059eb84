import fs from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { runRoundSimulation, type RoundSimulationRow } from '../src/sim/roundSimulation.ts';

const SEEDS = 20;
const ROUNDS = 25;

function toCsv(rows: readonly RoundSimulationRow[]): string {
  const header =
    'seed,round,threatBudget,budgetSpent,populationCap,bossQuota,units,bosses,spawnPoints,kills,tritium,duration';
  const lines = rows.map((row) =>
    [
      row.seed,
      row.round,
      row.threatBudget,
      row.budgetSpent,
      row.populationCap,
      row.bossQuota,
      row.unitCount,
      row.bossCount,
      row.spawnPoints,
      row.kills,
      row.tritium,
      row.durationSeconds.toFixed(2)
    ].join(',')
  );
  return [header, ...lines].join('\n');
}

async function main(): Promise<void> {
  const seeds = Array.from({ length: SEEDS }, (_, index) => index);
  const rows = seeds.flatMap(
    (seed) => runRoundSimulation({ seed, rounds: ROUNDS, killRatio: 0.8 }).rows
  );

  const balancePath = join(tmpdir(), 'wave-balance.csv');
  await fs.writeFile(balancePath, toCsv(rows), 'utf8');
  console.log(`Balance snapshot saved to ${balancePath}`);
}

void main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
