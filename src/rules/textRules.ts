import { RuleId, type RuleFinding } from '../types/index.js';

export function checkTextLength(count: number, maxLength: number): RuleFinding[] {
  if (count <= maxLength) return [];
  return [{
    kind: 'violation',
    rule: RuleId.text_length,
    message: `content length exceeded: expected=${maxLength}, got=${count}`,
  }];
}
