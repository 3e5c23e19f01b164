import type { GuardrailSeverity } from '../types/index.js';

export type PatternCategory =
  | 'code-execution'
  | 'shell'
  | 'network'
  | 'credentials'
  | 'filesystem'
  | 'reflection';

export interface TextPattern {
  id: string;
  category: PatternCategory;
  severity: Exclude<GuardrailSeverity, 'info'>;
  pattern: RegExp;
  description: string;
}

// Method-style calls (`re.exec(`, `model.eval(`) are not hits: the lookbehind
// requires the name to stand alone.
export const TEXT_PATTERNS: readonly TextPattern[] = [
  // Code execution
  { id: 'eval-call', category: 'code-execution', severity: 'block', pattern: /(?<![.\w])eval\s*\(/, description: 'eval call' },
  { id: 'exec-call', category: 'code-execution', severity: 'block', pattern: /(?<![.\w])exec\s*\(/, description: 'exec call' },
  { id: 'function-constructor', category: 'code-execution', severity: 'block', pattern: /(?<![.\w])Function\s*\(/, description: 'Function constructor' },
  { id: 'dynamic-import', category: 'code-execution', severity: 'block', pattern: /__import__\s*\(/, description: '__import__ call' },
  { id: 'compile-call', category: 'code-execution', severity: 'block', pattern: /(?<![.\w])compile\s*\(/, description: 'compile call' },
  { id: 'string-timer', category: 'code-execution', severity: 'block', pattern: /\bset(?:Timeout|Interval)\s*\(\s*["'`]/, description: 'timer with a code string' },

  // Shell invocation
  { id: 'os-system', category: 'shell', severity: 'block', pattern: /\bos\.(?:system|popen|exec\w*|spawn\w*)\s*\(/, description: 'os process call' },
  { id: 'subprocess', category: 'shell', severity: 'block', pattern: /\bsubprocess\.\w+\s*\(/, description: 'subprocess call' },
  { id: 'child-process', category: 'shell', severity: 'block', pattern: /\bchild_process\b/, description: 'child_process module' },
  { id: 'spawn-call', category: 'shell', severity: 'block', pattern: /(?<![.\w])(?:spawn|spawnSync|execSync|execFile|execFileSync)\s*\(/, description: 'process spawn' },
  { id: 'python-process-import', category: 'shell', severity: 'block', pattern: /^\s*(?:import|from)\s+(?:os|subprocess|shutil)\b/m, description: 'process module import' },
  { id: 'rm-recursive', category: 'shell', severity: 'block', pattern: /\brm\s+-[a-z]*[rf]/i, description: 'forced or recursive rm' },
  { id: 'sudo', category: 'shell', severity: 'block', pattern: /\bsudo\s+\S/, description: 'sudo' },
  { id: 'chmod-777', category: 'shell', severity: 'block', pattern: /\bchmod\s+(?:-R\s+)?777\b/, description: 'world-writable chmod' },
  { id: 'pipe-to-shell', category: 'shell', severity: 'block', pattern: /\|\s*(?:ba|z)?sh\b/, description: 'pipe into a shell' },
  { id: 'disk-tools', category: 'shell', severity: 'block', pattern: /\b(?:mkfs(?:\.\w+)?|dd\s+if=)/, description: 'disk-level tool' },

  // Network access
  { id: 'python-network', category: 'network', severity: 'block', pattern: /\b(?:urllib\.request|requests\.(?:get|post|put|patch|delete)\s*\(|socket\.|ftplib|smtplib)/, description: 'network library' },
  { id: 'python-network-import', category: 'network', severity: 'block', pattern: /^\s*(?:import|from)\s+(?:socket|urllib|requests|ftplib|smtplib)\b/m, description: 'network module import' },
  { id: 'fetch-url', category: 'network', severity: 'block', pattern: /\bfetch\s*\(\s*["'`]https?:/, description: 'fetch of a URL' },
  { id: 'browser-network', category: 'network', severity: 'block', pattern: /\b(?:XMLHttpRequest|WebSocket)\b/, description: 'browser network API' },
  { id: 'download-tools', category: 'network', severity: 'block', pattern: /\b(?:curl|wget)\s+(?:-\S+\s+)*["']?(?:https?|ftp):\/\//, description: 'download tool' },

  // Credentials
  { id: 'private-key', category: 'credentials', severity: 'block', pattern: /-----BEGIN (?:[A-Z]+ )*PRIVATE KEY-----/, description: 'private key block' },
  { id: 'secret-assignment', category: 'credentials', severity: 'block', pattern: /\b(?:password|passwd|secret|token|api[_-]?key)\s*[:=]\s*["'][^"'\s]{4,}["']/i, description: 'hard-coded secret' },
  { id: 'aws-access-key', category: 'credentials', severity: 'block', pattern: /\bAKIA[0-9A-Z]{16}\b/, description: 'AWS access key id' },

  // Filesystem access: deletes and absolute opens block, the rest warn
  { id: 'destructive-fs', category: 'filesystem', severity: 'block', pattern: /\b(?:shutil\.(?:rmtree|move)|os\.(?:remove|unlink|rmdir)|fs\.(?:rm|rmdir|unlink)(?:Sync)?)\s*\(/, description: 'file deletion' },
  { id: 'absolute-open', category: 'filesystem', severity: 'block', pattern: /\bopen\s*\(\s*["'][/\\]/, description: 'open of an absolute path' },
  { id: 'path-access', category: 'filesystem', severity: 'warning', pattern: /\b(?:os\.path|pathlib|glob)\./, description: 'path access' },
  { id: 'fs-access', category: 'filesystem', severity: 'warning', pattern: /\bfs\.(?:read|write|append|create|copy|rename)\w*\s*\(/, description: 'file access' },

  // Reflection
  { id: 'attribute-reflection', category: 'reflection', severity: 'warning', pattern: /(?<![.\w])(?:getattr|setattr|delattr)\s*\(/, description: 'dynamic attribute access' },
  { id: 'dunder-access', category: 'reflection', severity: 'warning', pattern: /__(?:class|dict|getattribute|globals|builtins)__/, description: 'interpreter internals' },
  { id: 'scope-reflection', category: 'reflection', severity: 'warning', pattern: /(?<![.\w])(?:globals|locals)\s*\(\s*\)/, description: 'scope reflection' },
  { id: 'reflect-api', category: 'reflection', severity: 'warning', pattern: /\bReflect\.\w+\s*\(/, description: 'Reflect API' },
];

export interface PatternMatch {
  pattern: TextPattern;
  match: string;
}

/**
 * Every pattern that hits `text`, once each, in table order.
 */
export function scanText(text: string, patterns: readonly TextPattern[] = TEXT_PATTERNS): PatternMatch[] {
  const matches: PatternMatch[] = [];
  for (const pattern of patterns) {
    const found = pattern.pattern.exec(text);
    if (found) {
      matches.push({ pattern, match: found[0] });
    }
  }
  return matches;
}

/**
 * Flags that make an otherwise allowlisted command destructive.
 */
export const DANGEROUS_FLAGS: readonly string[] = [
  '--delete',
  '--remove',
  '--force',
  '--privileged',
  '--cap-add',
  '--security-opt',
  '--no-preserve-root',
];

// rm-style combined short flags: -rf, -fr, -Rf, -rfv ...
export const COMBINED_FORCE_FLAG = /^-[a-zA-Z]*(?:[rR]f|f[rR])[a-zA-Z]*$/;

export const SHELL_CHAINING = /[;&|`<>]|\$\(/;

export const SENSITIVE_SEGMENTS: readonly string[] = ['.git', 'node_modules', '.ssh', '.aws', '.gnupg'];

export const SENSITIVE_FILE = /^(?:\.env(?:\..*)?|\.npmrc|\.netrc|\.pypirc|id_(?:rsa|dsa|ecdsa|ed25519)(?:\.pub)?|.*\.(?:pem|key|p12|pfx|crt|cer|keystore|jks))$/i;
