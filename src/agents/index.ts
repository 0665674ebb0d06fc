import type { Dimension } from '../types/analysis.js';
import { TechAgent } from './techAgent.js';
import { TextAgent } from './textAgent.js';
import { TrustAgent } from './trustAgent.js';
import type { Agent, AgentDeps } from './types.js';
import { UxAgent } from './uxAgent.js';
import { VisualAgent, type VisualAgentOptions } from './visualAgent.js';

export type AgentSet = Record<Dimension, Agent>;

export function createAgents(deps: AgentDeps, options: VisualAgentOptions = {}): AgentSet {
  return {
    TEXT: new TextAgent(deps),
    VISUAL: new VisualAgent(deps, options),
    UX: new UxAgent(deps),
    TRUST: new TrustAgent(deps),
    TECH: new TechAgent(deps),
  };
}

export { BaseAgent, clampScore } from './baseAgent.js';
export type { Agent, AgentDeps, AnalyzeOptions, ModelCall } from './types.js';
export { TextAgent, VisualAgent, UxAgent, TrustAgent, TechAgent };
