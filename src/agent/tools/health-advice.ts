/**
 * health_advice: condition-specific advice with a generic fallback.
 */

import { z } from 'zod';
import { found, notFound, type Lookup } from '../types.js';
import { GENERAL_ADVICE, HEALTH_ADVICE, type HealthAdvice } from './tables.js';
import { defineTool } from './registry.js';

export function lookupAdvice(condition: string): Lookup<HealthAdvice> {
  const advice = HEALTH_ADVICE.get(condition.trim());
  return advice ? found(advice) : notFound();
}

export function adviseOn(condition: string, lifestyleFactors?: readonly string[]): string {
  const lines = [`针对 '${condition}' 的健康建议:`, ''];

  const lookup = lookupAdvice(condition);
  if (lookup.kind === 'found') {
    lines.push(
      `饮食建议: ${lookup.value.diet}`,
      `运动建议: ${lookup.value.exercise}`,
      `生活建议: ${lookup.value.lifestyle}`,
      ''
    );
  } else {
    lines.push('一般健康建议:', ...GENERAL_ADVICE.map((item) => `- ${item}`), '');
  }

  if (lifestyleFactors && lifestyleFactors.length > 0) {
    lines.push(
      `基于您的生活方式因素 (${lifestyleFactors.join(', ')})，建议进一步咨询医生制定个性化健康方案。`,
      ''
    );
  }

  lines.push('重要提醒: 以上建议仅供参考，具体治疗方案请遵医嘱。');
  return lines.join('\n');
}

export const healthAdviceTool = defineTool({
  name: 'health_advice',
  description: '根据病症提供健康生活建议',
  parameters: {
    type: 'object',
    properties: {
      condition: { type: 'string', description: '疾病或健康状况' },
      lifestyle_factors: { type: 'array', items: { type: 'string' }, description: '生活方式因素（可选）' },
    },
    required: ['condition'],
  },
  input: z.object({
    condition: z.string(),
    lifestyle_factors: z.array(z.string()).optional(),
  }),
  handler: (input) => adviseOn(input.condition, input.lifestyle_factors),
});
