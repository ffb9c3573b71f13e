import { describe, it, expect, vi } from 'vitest';

import { analyzeSymptoms, matchConditions, symptomAnalysisTool } from '../symptom-analysis.js';
import { describeDrug, drugInformationTool, lookupDrug } from '../drug-information.js';
import { adviseOn, healthAdviceTool } from '../health-advice.js';
import { assessEmergency, classifyUrgency, emergencyAssessmentTool, formatEmergencyAssessment } from '../emergency-assessment.js';
import { matchDepartments, recommendDepartments } from '../department-recommendation.js';
import { createKnowledgeSearchTool, formatSearchResults, NO_SEARCH_RESULTS } from '../knowledge-search.js';
import { DEFAULT_DEPARTMENT } from '../tables.js';
import { ToolInputError } from '../registry.js';
import type { Passage, SearchOutcome } from '../../../search/types.js';

describe('symptom_analysis', () => {
  it('collects conditions in table order without duplicates', () => {
    expect(matchConditions(['发热', '咳嗽'])).toEqual(['感冒', '流感', '感染', '支气管炎', '肺炎']);
  });

  it('reports 无 when nothing matches', () => {
    expect(analyzeSymptoms(['乏力'])).toBe(
      ['症状分析报告:', '主要症状: 乏力', '', '可能的疾病: 无', '', '注意: 此分析仅供参考，请及时就医获得专业诊断。'].join(
        '\n'
      )
    );
  });

  it('prints patient details when given', () => {
    const text = analyzeSymptoms(['头痛'], { age: 45, gender: '男', medical_history: ['糖尿病', '痛风'] });

    expect(text).toBe(
      [
        '症状分析报告:',
        '主要症状: 头痛',
        '',
        '患者信息:',
        '- 年龄: 45岁',
        '- 性别: 男',
        '- 既往病史: 糖尿病、痛风',
        '',
        '可能的疾病: 偏头痛, 紧张性头痛, 高血压',
        '',
        '注意: 此分析仅供参考，请及时就医获得专业诊断。',
      ].join('\n')
    );
  });

  it('omits the patient block when it is empty', () => {
    expect(analyzeSymptoms(['腹痛'], {})).not.toContain('患者信息');
  });

  it('reports on an empty symptom list', async () => {
    const text = await symptomAnalysisTool.run({ symptoms: [] }, {});

    expect(text.split('\n').slice(0, 4)).toEqual(['症状分析报告:', '主要症状: ', '', '可能的疾病: 无']);
  });

  it('accepts an age sent as text', async () => {
    const text = await symptomAnalysisTool.run({ symptoms: ['头痛'], patient_info: { age: '35' } }, {});

    expect(text).toContain('患者信息:\n- 年龄: 35岁\n');
  });
});

describe('drug_information', () => {
  it('describes a known drug', () => {
    expect(describeDrug('布洛芬')).toBe(
      [
        '药物: 布洛芬',
        '',
        '作用: 解热镇痛抗炎',
        '用法用量: 口服，每次200-400mg，每日2-3次',
        '副作用: 胃肠道不适、头晕',
        '注意事项: 餐后服用，避免长期使用',
        '',
        '警告: 请在医生指导下使用药物，不要自行调整剂量。',
      ].join('\n')
    );
  });

  it('returns the same text on repeated lookups', () => {
    expect(describeDrug('阿司匹林')).toBe(describeDrug('阿司匹林'));
  });

  it('trims the name before lookup', () => {
    expect(lookupDrug(' 对乙酰氨基酚 ').kind).toBe('found');
  });

  it('points to a pharmacist for unknown drugs', async () => {
    expect(await drugInformationTool.run({ drug_name: '青霉素' }, {})).toBe(
      "未找到药物 '青霉素' 的信息。建议咨询医生或药师获取详细信息。"
    );
  });
});

describe('health_advice', () => {
  it('gives condition-specific advice', () => {
    expect(adviseOn('糖尿病')).toBe(
      [
        "针对 '糖尿病' 的健康建议:",
        '',
        '饮食建议: 控制碳水化合物摄入，定时定量进餐',
        '运动建议: 餐后30分钟适量运动',
        '生活建议: 监测血糖，按时服药，足部护理',
        '',
        '重要提醒: 以上建议仅供参考，具体治疗方案请遵医嘱。',
      ].join('\n')
    );
  });

  it('falls back to general advice and mentions lifestyle factors', async () => {
    const text = await healthAdviceTool.run({ condition: '哮喘', lifestyle_factors: ['吸烟', '熬夜'] }, {});

    expect(text).toBe(
      [
        "针对 '哮喘' 的健康建议:",
        '',
        '一般健康建议:',
        '- 保持均衡饮食',
        '- 适量运动',
        '- 规律作息',
        '- 定期体检',
        '',
        '基于您的生活方式因素 (吸烟, 熬夜)，建议进一步咨询医生制定个性化健康方案。',
        '',
        '重要提醒: 以上建议仅供参考，具体治疗方案请遵医嘱。',
      ].join('\n')
    );
  });
});

describe('emergency_assessment', () => {
  it('lets an emergency keyword override a mild severity', () => {
    const text = formatEmergencyAssessment(['剧烈头痛'], 'mild');

    expect(text.split('\n')).toEqual([
      '紧急程度评估:',
      '',
      '症状: 剧烈头痛',
      '严重程度: mild',
      '',
      '评估结果: 🔴 紧急',
      '建议: 建议立即就医或拨打急救电话120',
      '',
      '注意: 此评估仅供参考，如有疑虑请及时就医。',
    ]);
  });

  it('classifies by keywords and severity', () => {
    expect(classifyUrgency(['皮疹'], 'mild')).toBe('urgent');
    expect(classifyUrgency(['流鼻涕'], 'mild')).toBe('routine');
    expect(classifyUrgency(['流鼻涕'], 'severe')).toBe('emergency');
  });

  it('defaults to moderate severity', () => {
    expect(assessEmergency(['流鼻涕']).tier).toBe('urgent');
  });

  it('classifies from severity alone when no symptoms are given', async () => {
    const text = await emergencyAssessmentTool.run({ symptoms: [], severity: 'severe' }, {});

    expect(text).toContain('评估结果: 🔴 紧急');
  });

  it('rejects severities outside the enum', async () => {
    await expect(emergencyAssessmentTool.run({ symptoms: ['头晕'], severity: 'critical' }, {})).rejects.toThrow(
      ToolInputError
    );
  });
});

describe('department_recommendation', () => {
  it('deduplicates departments in order of first match', () => {
    expect(matchDepartments(['头痛', '咳嗽', '胸闷', '心慌'])).toEqual(['神经内科', '呼吸科', '心内科']);
  });

  it('also matches the suspected condition', () => {
    expect(matchDepartments(['乏力'], '胃溃疡')).toEqual(['消化科']);
  });

  it('falls back to the default department', () => {
    expect(matchDepartments(['乏力'])).toEqual([DEFAULT_DEPARTMENT]);
  });

  it('formats the recommendation', () => {
    expect(recommendDepartments(['关节肿痛'], '痛风')).toBe(
      [
        '科室推荐:',
        '',
        '症状: 关节肿痛',
        '疑似疾病: 痛风',
        '',
        '推荐科室:',
        '- 骨科',
        '',
        '提醒: 如不确定，可先挂号内科，由医生进一步转诊。',
      ].join('\n')
    );
  });
});

describe('knowledge_search', () => {
  const passages: Passage[] = [
    { content: '高血压诊断标准为收缩压≥140mmHg。', source: 'kb/cardio/hypertension.md', score: 0.91 },
    { content: '糖尿病需监测血糖。', source: 'diabetes.txt', score: 0.72 },
  ];

  it('numbers results and shows file names', () => {
    expect(formatSearchResults(passages)).toBe(
      '结果1: 来源: hypertension.md\n高血压诊断标准为收缩压≥140mmHg。\n\n结果2: 来源: diabetes.txt\n糖尿病需监测血糖。'
    );
  });

  it('reports empty results', () => {
    expect(formatSearchResults([])).toBe(NO_SEARCH_RESULTS);
  });

  it('passes query and default top_k to the retriever', async () => {
    const searchDetailed = vi.fn((): Promise<SearchOutcome> => Promise.resolve({ passages }));
    const tool = createKnowledgeSearchTool({ searchDetailed });

    await tool.run({ query: '高血压' }, {});

    expect(searchDetailed).toHaveBeenCalledWith('高血压', 3, { signal: undefined });
  });

  it('surfaces retrieval errors as text', async () => {
    const tool = createKnowledgeSearchTool({
      searchDetailed: () => Promise.resolve({ passages: [], error: 'index offline' }),
    });

    expect(await tool.run({ query: '咳嗽', top_k: 2 }, {})).toBe('搜索医疗知识时出错: index offline');
  });
});
