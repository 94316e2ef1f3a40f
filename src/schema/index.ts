import type { ValidationIssue } from '../types';

export * from './descriptor.schema';

/** 构造统一的诊断对象（编译器各阶段复用） */
export function issue(code: string, path: string, message: string, hint?: string): ValidationIssue {
  return hint === undefined ? { code, path, message } : { code, path, message, hint };
}
