// Имя файла прогона по умолчанию.
import { join, resolve } from 'node:path';

export interface OutputTargetInput {
  // Явный путь (--output).
  output?: string;
  topicsName: string;
  budget: number;
  // Директория для имени по умолчанию.
  dir: string;
  // Тег при явном пути.
  tag: string;
}

export interface OutputTarget {
  path: string;
  tag: string;
}

// Детерминированное имя прогона: одинаковые параметры — одинаковое имя.
export function defaultRunName(topicsName: string, budget: number): string {
  return ['run', topicsName, `rho_${budget}`].join('.');
}

/**
 * Без --output: путь <dir>/run.<topics>.rho_<budget>.txt, тег — имя без .txt.
 * С --output: путь как есть, тег из конфигурации.
 */
export function resolveOutputTarget(input: OutputTargetInput): OutputTarget {
  if (input.output) {
    return { path: resolve(input.output), tag: input.tag };
  }

  const runName = defaultRunName(input.topicsName, input.budget);
  return { path: resolve(join(input.dir, `${runName}.txt`)), tag: runName };
}
