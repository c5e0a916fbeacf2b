/**
 * navbuddy models: list models installed in Ollama
 */

import { loadConfig, type NavigatorConfig } from '../config/config.js';
import { OllamaOracle } from '../oracle/ollama.js';
import { exitWithError } from './output.js';

export async function modelsCommand(): Promise<void> {
  let config: NavigatorConfig;
  try {
    config = loadConfig();
  } catch (err) {
    exitWithError(err);
  }

  const oracle = new OllamaOracle({ url: config.oracle.url, model: config.oracle.model });
  let models: string[];
  try {
    models = await oracle.listModels();
  } catch (err) {
    console.error(`  ❌ ${(err as Error).message}`);
    console.error('  Is Ollama running? Start it with: ollama serve');
    process.exit(1);
  }

  console.log('');
  if (models.length === 0) {
    console.log('  No models installed. Try: ollama pull llama3.2');
  }
  for (const name of models) {
    const active = name === config.oracle.model || name.startsWith(`${config.oracle.model}:`);
    console.log(`  ${active ? '▶' : ' '} ${name}`);
  }
  console.log('');
}
