import path from 'node:path';
import type { WardenConfig } from '../config/index.js';
import {
  GuardrailContext,
  GuardrailPolicy,
  GuardrailSeverity,
  GuardrailVerdict,
  GuardrailViolation,
  SecurityViolationError,
  TargetScope,
  TaskPayload,
  VerdictSummary,
} from '../types/index.js';
import { DEFAULT_RULES, GuardrailRule } from '../guardrails/rules.js';
import { Clock, systemClock } from '../utils/index.js';

export function policyFromConfig(config: WardenConfig): GuardrailPolicy {
  return {
    workspaceRoot: config.guardrails.workspaceRoot,
    agentRoot: config.governance.agentRoot,
    maxPayloadBytes: config.guardrails.maxPayloadBytes,
    maxOutputBytes: config.guardrails.maxOutputBytes,
    allowedExtensions: config.guardrails.allowedExtensions,
    allowedCommands: config.guardrails.allowedCommands,
  };
}

/**
 * Runs the rule registry over a context and folds the findings into a
 * verdict. Everything except `evaluatedAt` is a pure function of the
 * context and the policy.
 */
export class GuardrailService {
  private readonly policy: GuardrailPolicy;

  constructor(
    policy: GuardrailPolicy,
    private readonly rules: readonly GuardrailRule[] = DEFAULT_RULES,
    private readonly clock: Clock = systemClock
  ) {
    this.policy = {
      ...policy,
      workspaceRoot: path.resolve(policy.workspaceRoot),
      agentRoot: path.resolve(policy.agentRoot),
    };
  }

  getPolicy(): GuardrailPolicy {
    return this.policy;
  }

  evaluate(context: GuardrailContext): GuardrailVerdict {
    const violations: GuardrailViolation[] = [];
    for (const rule of this.rules) {
      if (!rule.appliesTo.includes(context.kind)) {
        continue;
      }
      for (const finding of rule.evaluate(context, this.policy)) {
        violations.push({ ruleName: rule.name, ...finding });
      }
    }
    return {
      allowed: !violations.some(v => v.severity === 'block'),
      violations,
      evaluatedAt: this.clock(),
    };
  }

  checkTask(type: string, payload: TaskPayload): GuardrailVerdict {
    return this.evaluate({ kind: 'task', type, payload });
  }

  checkOutput(content: string, language?: string): GuardrailVerdict {
    return this.evaluate({ kind: 'output', content, language });
  }

  checkPath(relativePath: string, scope: TargetScope): GuardrailVerdict {
    return this.evaluate({ kind: 'path', path: relativePath, scope });
  }

  checkCommand(command: string): GuardrailVerdict {
    return this.evaluate({ kind: 'command', command });
  }

  /**
   * Absolute location of a path that already passed `checkPath`.
   */
  resolvePath(relativePath: string, scope: TargetScope): string {
    const root = scope === 'agent' ? this.policy.agentRoot : this.policy.workspaceRoot;
    return path.resolve(root, relativePath);
  }

  summarize(verdict: GuardrailVerdict): VerdictSummary {
    return summarizeVerdict(verdict);
  }
}

export function violationError(verdict: GuardrailVerdict, subject: string): SecurityViolationError {
  const first = verdict.violations.find(v => v.severity === 'block');
  const reason = first ? `${first.ruleName}: ${first.message}` : 'policy';
  return new SecurityViolationError(`${subject} blocked by ${reason}`, verdict);
}

/**
 * Throws when the verdict blocks. `subject` names what was checked.
 */
export function assertAllowed(verdict: GuardrailVerdict, subject: string): void {
  if (!verdict.allowed) {
    throw violationError(verdict, subject);
  }
}

export function summarizeVerdict(verdict: GuardrailVerdict): VerdictSummary {
  const bySeverity: Record<GuardrailSeverity, number> = { info: 0, warning: 0, block: 0 };
  const rules: string[] = [];
  for (const violation of verdict.violations) {
    bySeverity[violation.severity] += 1;
    if (!rules.includes(violation.ruleName)) {
      rules.push(violation.ruleName);
    }
  }

  let level: VerdictSummary['level'] = 'safe';
  if (bySeverity.block > 0) {
    level = 'blocked';
  } else if (bySeverity.warning > 0) {
    level = 'warning';
  } else if (bySeverity.info > 0) {
    level = 'low';
  }

  return { level, total: verdict.violations.length, bySeverity, rules };
}
