/**
 * symptom_analysis: keyword matching against the symptom table.
 */

import { z } from 'zod';
import { SYMPTOM_CONDITIONS } from './tables.js';
import { defineTool } from './registry.js';

const patientInfoSchema = z.object({
  // Models sometimes send the age as text ("35"); it is printed as given
  age: z.union([z.number(), z.string()]).optional(),
  gender: z.string().optional(),
  medical_history: z.array(z.string()).optional(),
});

const inputSchema = z.object({
  symptoms: z.array(z.string()),
  patient_info: patientInfoSchema.optional(),
});

export type PatientInfo = z.infer<typeof patientInfoSchema>;

/**
 * Conditions whose keyword occurs in any symptom, deduplicated, in table
 * order of first match.
 */
export function matchConditions(symptoms: readonly string[]): string[] {
  const conditions = new Set<string>();
  for (const symptom of symptoms) {
    for (const [keyword, candidates] of SYMPTOM_CONDITIONS) {
      if (symptom.includes(keyword)) {
        candidates.forEach((condition) => conditions.add(condition));
      }
    }
  }
  return [...conditions];
}

export function analyzeSymptoms(symptoms: readonly string[], patientInfo?: PatientInfo): string {
  const lines = ['症状分析报告:', `主要症状: ${symptoms.join('、')}`, ''];

  if (patientInfo) {
    const details: string[] = [];
    if (patientInfo.age !== undefined) details.push(`- 年龄: ${patientInfo.age}岁`);
    if (patientInfo.gender !== undefined) details.push(`- 性别: ${patientInfo.gender}`);
    if (patientInfo.medical_history !== undefined) {
      details.push(`- 既往病史: ${patientInfo.medical_history.join('、')}`);
    }
    if (details.length > 0) {
      lines.push('患者信息:', ...details, '');
    }
  }

  const conditions = matchConditions(symptoms);
  lines.push(`可能的疾病: ${conditions.length > 0 ? conditions.join(', ') : '无'}`, '');
  lines.push('注意: 此分析仅供参考，请及时就医获得专业诊断。');

  return lines.join('\n');
}

export const symptomAnalysisTool = defineTool({
  name: 'symptom_analysis',
  description: '分析症状，提供初步诊断建议',
  parameters: {
    type: 'object',
    properties: {
      symptoms: { type: 'array', items: { type: 'string' }, description: '症状列表' },
      patient_info: {
        type: 'object',
        properties: {
          age: { type: 'integer' },
          gender: { type: 'string' },
          medical_history: { type: 'array', items: { type: 'string' } },
        },
        description: '患者基本信息（可选）',
      },
    },
    required: ['symptoms'],
  },
  input: inputSchema,
  handler: (input) => analyzeSymptoms(input.symptoms, input.patient_info),
});
