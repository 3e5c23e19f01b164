import path from 'node:path';
import {
  GuardrailContext,
  GuardrailContextKind,
  GuardrailPolicy,
  GuardrailSeverity,
  TargetScope,
  isTaskType,
} from '../types/index.js';
import { utf8ByteLength } from '../utils/index.js';
import {
  COMBINED_FORCE_FLAG,
  DANGEROUS_FLAGS,
  SENSITIVE_FILE,
  SENSITIVE_SEGMENTS,
  SHELL_CHAINING,
  scanText,
} from './patterns.js';
import { scanSyntax } from './syntaxScanner.js';

export interface GuardrailFinding {
  severity: GuardrailSeverity;
  message: string;
}

/**
 * A rule is a pure function of its context and the policy: no clock, no
 * randomness, no IO. The same input always yields the same findings.
 */
export interface GuardrailRule {
  name: string;
  appliesTo: readonly GuardrailContextKind[];
  evaluate(context: GuardrailContext, policy: GuardrailPolicy): GuardrailFinding[];
}

interface ScopedPath {
  label: string;
  path: string;
  scope: TargetScope;
}

function block(message: string): GuardrailFinding {
  return { severity: 'block', message };
}

// Paths a context names: the path itself, or a task's input file and target.
function scopedPaths(context: GuardrailContext): ScopedPath[] {
  if (context.kind === 'path') {
    return [{ label: 'Path', path: context.path, scope: context.scope }];
  }
  if (context.kind !== 'task') {
    return [];
  }
  const paths: ScopedPath[] = [];
  if (context.payload.filePath !== undefined) {
    paths.push({ label: 'Input file', path: context.payload.filePath, scope: 'workspace' });
  }
  if (context.payload.target) {
    paths.push({ label: 'Target', path: context.payload.target.path, scope: context.payload.target.scope });
  }
  return paths;
}

function scopeRoot(scope: TargetScope, policy: GuardrailPolicy): string {
  return scope === 'agent' ? policy.agentRoot : policy.workspaceRoot;
}

function pathSegments(candidate: string): string[] {
  return candidate.split(/[\\/]+/).filter(segment => segment.length > 0);
}

function containmentProblem(candidate: string, root: string): string | null {
  if (candidate.includes('\0')) {
    return 'contains a NUL byte';
  }
  if (candidate.trim() === '') {
    return 'is empty';
  }
  if (pathSegments(candidate).includes('..')) {
    return 'contains a parent-directory segment';
  }
  const relative = path.relative(root, path.resolve(root, candidate));
  if (relative === '') {
    return 'resolves to the scope root itself';
  }
  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return 'resolves outside its scope root';
  }
  return null;
}

const taskTypeAllowlist: GuardrailRule = {
  name: 'task-type-allowlist',
  appliesTo: ['task'],
  evaluate(context) {
    if (context.kind !== 'task' || isTaskType(context.type)) {
      return [];
    }
    return [block(`Task type "${context.type}" is not allowed`)];
  },
};

const pathContainment: GuardrailRule = {
  name: 'path-containment',
  appliesTo: ['task', 'path'],
  evaluate(context, policy) {
    const findings: GuardrailFinding[] = [];
    for (const target of scopedPaths(context)) {
      const problem = containmentProblem(target.path, scopeRoot(target.scope, policy));
      if (problem) {
        findings.push(block(`${target.label} "${target.path}" ${problem} (${target.scope} scope)`));
      }
    }
    return findings;
  },
};

const sensitivePath: GuardrailRule = {
  name: 'sensitive-path',
  appliesTo: ['task', 'path'],
  evaluate(context) {
    const findings: GuardrailFinding[] = [];
    for (const target of scopedPaths(context)) {
      const segments = pathSegments(target.path);
      const directory = segments.slice(0, -1).find(segment => SENSITIVE_SEGMENTS.includes(segment));
      const fileName = segments[segments.length - 1] ?? '';
      if (directory !== undefined) {
        findings.push(block(`${target.label} "${target.path}" is inside ${directory}/`));
      } else if (SENSITIVE_SEGMENTS.includes(fileName) || SENSITIVE_FILE.test(fileName)) {
        findings.push(block(`${target.label} "${target.path}" names a sensitive file`));
      }
    }
    return findings;
  },
};

const extensionAllowlist: GuardrailRule = {
  name: 'extension-allowlist',
  appliesTo: ['task', 'path'],
  evaluate(context, policy) {
    const findings: GuardrailFinding[] = [];
    for (const target of scopedPaths(context)) {
      const extension = path.extname(target.path).toLowerCase();
      if (!policy.allowedExtensions.includes(extension)) {
        const shown = extension === '' ? 'no extension' : `extension ${extension}`;
        findings.push(block(`${target.label} "${target.path}" has ${shown}, which is not allowed`));
      }
    }
    return findings;
  },
};

const sizeLimit: GuardrailRule = {
  name: 'size-limit',
  appliesTo: ['task', 'output'],
  evaluate(context, policy) {
    if (context.kind === 'task') {
      const size = utf8ByteLength(context.payload.description) + utf8ByteLength(context.payload.code ?? '');
      return size > policy.maxPayloadBytes
        ? [block(`Payload is ${size} bytes, limit is ${policy.maxPayloadBytes}`)]
        : [];
    }
    if (context.kind === 'output') {
      const size = utf8ByteLength(context.content);
      return size > policy.maxOutputBytes
        ? [block(`Output is ${size} bytes, limit is ${policy.maxOutputBytes}`)]
        : [];
    }
    return [];
  },
};

function textOf(context: GuardrailContext): string | null {
  switch (context.kind) {
    case 'task':
      return context.payload.code ? `${context.payload.description}\n${context.payload.code}` : context.payload.description;
    case 'output':
      return context.content;
    default:
      return null;
  }
}

const dangerousPatternText: GuardrailRule = {
  name: 'dangerous-pattern-text',
  appliesTo: ['task', 'output'],
  evaluate(context) {
    const text = textOf(context);
    if (text === null) {
      return [];
    }
    return scanText(text).map(({ pattern, match }) => ({
      severity: pattern.severity,
      message: `${pattern.description} (${pattern.category}): ${JSON.stringify(match)}`,
    }));
  },
};

const dangerousPatternSyntax: GuardrailRule = {
  name: 'dangerous-pattern-syntax',
  appliesTo: ['task', 'output'],
  evaluate(context) {
    const code = context.kind === 'task' ? context.payload.code : context.kind === 'output' ? context.content : undefined;
    if (!code) {
      return [];
    }
    return scanSyntax(code).map(finding => block(`Line ${finding.line}: ${finding.message}`));
  },
};

const commandAllowlist: GuardrailRule = {
  name: 'command-allowlist',
  appliesTo: ['command'],
  evaluate(context, policy) {
    if (context.kind !== 'command') {
      return [];
    }
    const command = context.command.trim();
    if (command === '') {
      return [block('Command is empty')];
    }
    const findings: GuardrailFinding[] = [];
    if (SHELL_CHAINING.test(command)) {
      findings.push(block('Shell chaining, substitution and redirection are not allowed'));
    }
    const [program = '', ...args] = command.split(/\s+/);
    const base = program.split(/[\\/]/).pop() ?? program;
    if (!policy.allowedCommands.includes(base)) {
      findings.push(block(`Command "${base}" is not allowlisted`));
    }
    for (const arg of args) {
      const flag = arg.split('=')[0] ?? arg;
      if (DANGEROUS_FLAGS.includes(flag)) {
        findings.push(block(`Dangerous flag ${flag}`));
      } else if (COMBINED_FORCE_FLAG.test(arg)) {
        findings.push(block(`Forced recursive flag ${arg}`));
      }
    }
    return findings;
  },
};

/**
 * Evaluation order. Verdict violations are listed in this order.
 */
export const DEFAULT_RULES: readonly GuardrailRule[] = [
  taskTypeAllowlist,
  pathContainment,
  sensitivePath,
  extensionAllowlist,
  sizeLimit,
  dangerousPatternText,
  dangerousPatternSyntax,
  commandAllowlist,
];
