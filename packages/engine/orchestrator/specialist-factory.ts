// Factory for creating specialist agent instances by task category

import type { TaskCategory } from '../types/query.js';
import type { AgentDependencies, SpecialistAgent } from '../agents/specialist-agent.js';
import { CalculationAgent } from '../agents/calculation-agent.js';
import { TemporalComparisonAgent } from '../agents/temporal-agent.js';
import { RiskExtractionAgent } from '../agents/risk-agent.js';
import { GeneralAgent } from '../agents/general-agent.js';

const FACTORY: Record<TaskCategory, (deps: AgentDependencies) => SpecialistAgent> = {
  calculation: deps => new CalculationAgent(deps),
  'temporal-comparison': deps => new TemporalComparisonAgent(deps),
  'risk-extraction': deps => new RiskExtractionAgent(deps),
  general: deps => new GeneralAgent(deps),
};

export function createSpecialist(category: TaskCategory, deps: AgentDependencies): SpecialistAgent {
  return FACTORY[category](deps);
}

/** One agent per category, sharing the same collaborators */
export function createSpecialists(deps: AgentDependencies): Record<TaskCategory, SpecialistAgent> {
  return {
    calculation: createSpecialist('calculation', deps),
    'temporal-comparison': createSpecialist('temporal-comparison', deps),
    'risk-extraction': createSpecialist('risk-extraction', deps),
    general: createSpecialist('general', deps),
  };
}
