/**
 * department_recommendation: maps symptom fragments to departments.
 */

import { z } from 'zod';
import { DEFAULT_DEPARTMENT, DEPARTMENTS } from './tables.js';
import { defineTool } from './registry.js';

/**
 * Departments matching any symptom or the suspected condition,
 * deduplicated. Falls back to a single default department.
 */
export function matchDepartments(symptoms: readonly string[], suspectedCondition?: string): string[] {
  const departments = new Set<string>();
  const texts = suspectedCondition ? [...symptoms, suspectedCondition] : symptoms;

  for (const text of texts) {
    for (const [fragment, department] of DEPARTMENTS) {
      if (text.includes(fragment)) {
        departments.add(department);
      }
    }
  }

  return departments.size > 0 ? [...departments] : [DEFAULT_DEPARTMENT];
}

export function recommendDepartments(symptoms: readonly string[], suspectedCondition?: string): string {
  const lines = ['科室推荐:', '', `症状: ${symptoms.join(', ')}`];
  if (suspectedCondition) {
    lines.push(`疑似疾病: ${suspectedCondition}`);
  }
  lines.push('', '推荐科室:');
  lines.push(...matchDepartments(symptoms, suspectedCondition).map((department) => `- ${department}`));
  lines.push('', '提醒: 如不确定，可先挂号内科，由医生进一步转诊。');
  return lines.join('\n');
}

export const departmentRecommendationTool = defineTool({
  name: 'department_recommendation',
  description: '根据症状推荐合适的医院科室',
  parameters: {
    type: 'object',
    properties: {
      symptoms: { type: 'array', items: { type: 'string' }, description: '症状描述' },
      suspected_condition: { type: 'string', description: '疑似疾病（可选）' },
    },
    required: ['symptoms'],
  },
  input: z.object({
    symptoms: z.array(z.string()),
    suspected_condition: z.string().optional(),
  }),
  handler: (input) => recommendDepartments(input.symptoms, input.suspected_condition),
});
