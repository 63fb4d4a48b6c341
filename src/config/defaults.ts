import type { Config } from './validator';

export const defaults: Config = {
  llm: {
    api_key: '',
    model: 'gemini-2.0-flash',
    temperature: 0.2,
    max_output_tokens: 8192,
    request_timeout_ms: 120_000,
  },
  sandbox: {
    api_key: '',
    template: 'base',
    execution_timeout_ms: 120_000,
    workdir: '/home/user/project',
  },
  workflow: {
    max_iterations: 3,
    max_repair_attempts: 2,
    stage_timeout_ms: 180_000,
  },
  output: {
    dir: 'generated_project',
    state_dir: '.autobuild',
  },
};
