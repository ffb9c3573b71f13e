/**
 * Static reference tables for the medical tools.
 *
 * Insertion order matters: matches are reported in table order.
 */

/** Symptom keyword → possible conditions */
export const SYMPTOM_CONDITIONS: ReadonlyMap<string, readonly string[]> = new Map([
  ['发热', ['感冒', '流感', '感染']],
  ['咳嗽', ['感冒', '支气管炎', '肺炎']],
  ['头痛', ['偏头痛', '紧张性头痛', '高血压']],
  ['胸痛', ['心绞痛', '肌肉拉伤', '焦虑']],
  ['腹痛', ['胃炎', '肠胃炎', '阑尾炎']],
]);

export interface DrugInfo {
  effect: string;
  dosage: string;
  sideEffects: string;
  precautions: string;
}

export const DRUGS: ReadonlyMap<string, DrugInfo> = new Map([
  [
    '阿司匹林',
    {
      effect: '解热镇痛、抗血小板聚集',
      dosage: '口服，每次75-100mg，每日1次',
      sideEffects: '胃肠道不适、出血风险增加',
      precautions: '餐后服用，注意出血风险',
    },
  ],
  [
    '布洛芬',
    {
      effect: '解热镇痛抗炎',
      dosage: '口服，每次200-400mg，每日2-3次',
      sideEffects: '胃肠道不适、头晕',
      precautions: '餐后服用，避免长期使用',
    },
  ],
  [
    '对乙酰氨基酚',
    {
      effect: '解热镇痛',
      dosage: '口服，每次500mg，每4-6小时一次',
      sideEffects: '过量可导致肝损伤',
      precautions: '注意日用量不超过4g',
    },
  ],
]);

export interface HealthAdvice {
  diet: string;
  exercise: string;
  lifestyle: string;
}

export const HEALTH_ADVICE: ReadonlyMap<string, HealthAdvice> = new Map([
  [
    '高血压',
    {
      diet: '低盐饮食，多吃蔬菜水果',
      exercise: '适量有氧运动，如散步、游泳',
      lifestyle: '规律作息，控制体重，戒烟限酒',
    },
  ],
  [
    '糖尿病',
    {
      diet: '控制碳水化合物摄入，定时定量进餐',
      exercise: '餐后30分钟适量运动',
      lifestyle: '监测血糖，按时服药，足部护理',
    },
  ],
  [
    '冠心病',
    {
      diet: '低脂低胆固醇饮食',
      exercise: '循序渐进的有氧运动',
      lifestyle: '控制情绪，避免过度劳累',
    },
  ],
]);

export const GENERAL_ADVICE: readonly string[] = ['保持均衡饮食', '适量运动', '规律作息', '定期体检'];

export const EMERGENCY_KEYWORDS: readonly string[] = [
  '胸痛',
  '呼吸困难',
  '意识模糊',
  '剧烈头痛',
  '高热',
  '大出血',
  '严重腹痛',
  '中毒症状',
];

export const URGENT_KEYWORDS: readonly string[] = ['持续发热', '剧烈咳嗽', '严重呕吐', '关节疼痛', '皮疹', '失眠'];

/** Body-part or symptom fragment → department */
export const DEPARTMENTS: ReadonlyMap<string, string> = new Map([
  ['心', '心内科'],
  ['胸', '心内科'],
  ['呼吸', '呼吸科'],
  ['咳嗽', '呼吸科'],
  ['腹', '消化科'],
  ['胃', '消化科'],
  ['头', '神经内科'],
  ['关节', '骨科'],
  ['皮', '皮肤科'],
  ['眼', '眼科'],
  ['耳', '耳鼻喉科'],
]);

export const DEFAULT_DEPARTMENT = '内科（建议先到内科初诊）';
