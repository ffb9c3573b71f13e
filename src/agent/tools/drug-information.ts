/**
 * drug_information: exact-name lookup in the drug table.
 */

import { z } from 'zod';
import { found, notFound, type Lookup } from '../types.js';
import { DRUGS, type DrugInfo } from './tables.js';
import { defineTool } from './registry.js';

export function lookupDrug(name: string): Lookup<DrugInfo> {
  const info = DRUGS.get(name.trim());
  return info ? found(info) : notFound();
}

export function describeDrug(drugName: string): string {
  const name = drugName.trim();
  const lookup = lookupDrug(name);

  if (lookup.kind !== 'found') {
    return `未找到药物 '${name}' 的信息。建议咨询医生或药师获取详细信息。`;
  }

  const info = lookup.value;
  return [
    `药物: ${name}`,
    '',
    `作用: ${info.effect}`,
    `用法用量: ${info.dosage}`,
    `副作用: ${info.sideEffects}`,
    `注意事项: ${info.precautions}`,
    '',
    '警告: 请在医生指导下使用药物，不要自行调整剂量。',
  ].join('\n');
}

export const drugInformationTool = defineTool({
  name: 'drug_information',
  description: '查询药物信息，包括用法用量、副作用等',
  parameters: {
    type: 'object',
    properties: {
      drug_name: { type: 'string', description: '药物名称' },
    },
    required: ['drug_name'],
  },
  input: z.object({ drug_name: z.string() }),
  handler: (input) => describeDrug(input.drug_name),
});
