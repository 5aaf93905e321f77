import { loadConfig } from './config';
import { runPipeline, type PipelineDeps, type PipelineSummary } from './services/pipeline';

// Configuration is validated before anything touches the network or database.
export async function main(env: NodeJS.ProcessEnv = process.env, deps: Partial<PipelineDeps> = {}): Promise<PipelineSummary> {
  const config = loadConfig(env);
  return runPipeline(config, deps);
}
