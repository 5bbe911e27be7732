import type { AgentType } from '../types/models.js';

export interface AgentPreset {
  temperature: number;
  maxTokens: number;
}

/** Applied when a create request leaves temperature or maxTokens out. */
export const AGENT_PRESETS: Record<AgentType, AgentPreset> = {
  markdown_generator: { temperature: 0.3, maxTokens: 4000 },
  code_analyzer: { temperature: 0.2, maxTokens: 3000 },
  project_planner: { temperature: 0.5, maxTokens: 2500 },
  document_writer: { temperature: 0.4, maxTokens: 4000 },
  mvp_specialist: { temperature: 0.7, maxTokens: 4000 },
};
