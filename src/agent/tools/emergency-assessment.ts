/**
 * emergency_assessment: three-tier urgency classification.
 *
 * Keyword matches are the primary signal. The reported severity can only
 * raise the tier, never lower it.
 */

import { z } from 'zod';
import { EMERGENCY_KEYWORDS, URGENT_KEYWORDS } from './tables.js';
import { defineTool } from './registry.js';

export const SEVERITIES = ['mild', 'moderate', 'severe'] as const;
export type Severity = (typeof SEVERITIES)[number];

export type UrgencyTier = 'emergency' | 'urgent' | 'routine';

export interface EmergencyAssessment {
  tier: UrgencyTier;
  label: string;
  marker: string;
  recommendation: string;
}

const TIERS: Record<UrgencyTier, Omit<EmergencyAssessment, 'tier'>> = {
  emergency: { label: '紧急', marker: '🔴', recommendation: '建议立即就医或拨打急救电话120' },
  urgent: { label: '较急', marker: '🟡', recommendation: '建议24小时内就医' },
  routine: { label: '一般', marker: '🟢', recommendation: '可预约门诊就医，注意观察症状变化' },
};

function matchesAny(symptoms: readonly string[], keywords: readonly string[]): boolean {
  return symptoms.some((symptom) => keywords.some((keyword) => symptom.includes(keyword)));
}

export function classifyUrgency(symptoms: readonly string[], severity: Severity): UrgencyTier {
  if (matchesAny(symptoms, EMERGENCY_KEYWORDS) || severity === 'severe') {
    return 'emergency';
  }
  if (matchesAny(symptoms, URGENT_KEYWORDS) || severity === 'moderate') {
    return 'urgent';
  }
  return 'routine';
}

export function assessEmergency(symptoms: readonly string[], severity: Severity = 'moderate'): EmergencyAssessment {
  const tier = classifyUrgency(symptoms, severity);
  return { tier, ...TIERS[tier] };
}

export function formatEmergencyAssessment(symptoms: readonly string[], severity: Severity = 'moderate'): string {
  const assessment = assessEmergency(symptoms, severity);
  return [
    '紧急程度评估:',
    '',
    `症状: ${symptoms.join(', ')}`,
    `严重程度: ${severity}`,
    '',
    `评估结果: ${assessment.marker} ${assessment.label}`,
    `建议: ${assessment.recommendation}`,
    '',
    '注意: 此评估仅供参考，如有疑虑请及时就医。',
  ].join('\n');
}

export const emergencyAssessmentTool = defineTool({
  name: 'emergency_assessment',
  description: '评估症状的紧急程度，判断是否需要立即就医',
  parameters: {
    type: 'object',
    properties: {
      symptoms: { type: 'array', items: { type: 'string' }, description: '当前症状' },
      severity: { type: 'string', enum: SEVERITIES, description: '症状严重程度' },
    },
    required: ['symptoms'],
  },
  input: z.object({
    symptoms: z.array(z.string()),
    severity: z.enum(SEVERITIES).optional(),
  }),
  handler: (input) => formatEmergencyAssessment(input.symptoms, input.severity),
});
