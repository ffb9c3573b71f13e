/**
 * Agent Tools
 *
 * Tools available to the reasoning loop. Build the registry once per
 * service and hand it to ReasoningLoop:
 *
 * ```typescript
 * const registry = createMedicalToolRegistry({ retriever });
 * const loop = new ReasoningLoop(backend, registry, { systemPrompt });
 * ```
 */

import type { KnowledgeRetriever } from '../../search/retriever.js';
import { createKnowledgeSearchTool } from './knowledge-search.js';
import { ToolRegistry } from './registry.js';
import { symptomAnalysisTool } from './symptom-analysis.js';
import { drugInformationTool } from './drug-information.js';
import { healthAdviceTool } from './health-advice.js';
import { emergencyAssessmentTool } from './emergency-assessment.js';
import { departmentRecommendationTool } from './department-recommendation.js';

export interface MedicalToolOptions {
  /** knowledge_search is only registered when a retriever is given */
  retriever?: Pick<KnowledgeRetriever, 'searchDetailed'>;
}

export function createMedicalToolRegistry(options: MedicalToolOptions = {}): ToolRegistry {
  const registry = new ToolRegistry();
  if (options.retriever) {
    registry.register(createKnowledgeSearchTool(options.retriever));
  }
  return registry
    .register(symptomAnalysisTool)
    .register(drugInformationTool)
    .register(healthAdviceTool)
    .register(emergencyAssessmentTool)
    .register(departmentRecommendationTool);
}

export {
  ToolRegistry,
  ToolInputError,
  defineTool,
  unknownToolObservation,
  invalidArgumentsObservation,
  toolErrorObservation,
  type Tool,
  type ToolContext,
  type ToolDefinition,
} from './registry.js';
export { createKnowledgeSearchTool, formatSearchResults, NO_SEARCH_RESULTS } from './knowledge-search.js';
export { analyzeSymptoms, matchConditions, symptomAnalysisTool, type PatientInfo } from './symptom-analysis.js';
export { describeDrug, lookupDrug, drugInformationTool } from './drug-information.js';
export { adviseOn, lookupAdvice, healthAdviceTool } from './health-advice.js';
export {
  assessEmergency,
  classifyUrgency,
  formatEmergencyAssessment,
  emergencyAssessmentTool,
  SEVERITIES,
  type Severity,
  type UrgencyTier,
  type EmergencyAssessment,
} from './emergency-assessment.js';
export { matchDepartments, recommendDepartments, departmentRecommendationTool } from './department-recommendation.js';
export type { DrugInfo, HealthAdvice } from './tables.js';
