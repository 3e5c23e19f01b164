import ts from 'typescript';

/**
 * Structural scan of candidate code. The TypeScript parser is error-tolerant,
 * so it also recovers call and import shapes from Python and other C-family
 * snippets well enough to find `eval(...)` or `os.system(...)`.
 */

export interface SyntaxFinding {
  line: number;
  message: string;
}

const BLOCKED_CALLS = new Set([
  'eval', 'exec', 'execSync', 'execFile', 'execFileSync', 'spawn', 'spawnSync',
  'system', 'popen', 'Function', '__import__', 'compile',
]);

const PROCESS_RECEIVERS = new Set([
  'os', 'subprocess', 'child_process', 'childProcess', 'cp', 'shell', 'shelljs',
]);

const PROCESS_METHODS = new Set([
  'system', 'popen', 'exec', 'execSync', 'execFile', 'execFileSync', 'spawn', 'spawnSync',
  'fork', 'run', 'call', 'Popen', 'check_output', 'check_call',
]);

const GLOBAL_RECEIVERS = new Set(['globalThis', 'window', 'global', 'self']);

const BLOCKED_CONSTRUCTORS = new Set(['Function', 'WebSocket', 'XMLHttpRequest', 'Worker']);

const BLOCKED_MODULES = new Set([
  'child_process', 'net', 'http', 'https', 'http2', 'dgram', 'tls', 'dns', 'vm',
  'worker_threads', 'cluster', 'shelljs', 'execa',
]);

function normalizeModule(specifier: string): string {
  return specifier.startsWith('node:') ? specifier.slice('node:'.length) : specifier;
}

export function isBlockedModule(specifier: string): boolean {
  const name = normalizeModule(specifier);
  return BLOCKED_MODULES.has(name) || BLOCKED_MODULES.has(name.split('/')[0] ?? name);
}

export function scanSyntax(code: string): SyntaxFinding[] {
  const source = ts.createSourceFile('candidate.ts', code, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
  const findings: SyntaxFinding[] = [];

  const report = (node: ts.Node, message: string): void => {
    const { line } = source.getLineAndCharacterOfPosition(node.getStart(source));
    findings.push({ line: line + 1, message });
  };

  const checkModule = (node: ts.Node, specifier: ts.Expression | undefined, how: string): void => {
    if (!specifier) return;
    if (!ts.isStringLiteralLike(specifier)) {
      report(node, `${how} of a computed module`);
      return;
    }
    if (isBlockedModule(specifier.text)) {
      report(node, `${how} of "${specifier.text}"`);
    }
  };

  const inspectCall = (node: ts.CallExpression): void => {
    const callee = node.expression;
    const firstArg = node.arguments[0];

    if (callee.kind === ts.SyntaxKind.ImportKeyword) {
      checkModule(node, firstArg, 'dynamic import');
      return;
    }

    if (ts.isIdentifier(callee)) {
      const name = callee.text;
      if (name === 'require') {
        checkModule(node, firstArg, 'require');
      } else if (BLOCKED_CALLS.has(name)) {
        report(node, `call to ${name}`);
      } else if ((name === 'setTimeout' || name === 'setInterval') && firstArg && ts.isStringLiteralLike(firstArg)) {
        report(node, `${name} with a code string`);
      }
      return;
    }

    if (ts.isPropertyAccessExpression(callee) && ts.isIdentifier(callee.expression)) {
      const receiver = callee.expression.text;
      const method = callee.name.text;
      if (PROCESS_RECEIVERS.has(receiver) && PROCESS_METHODS.has(method)) {
        report(node, `call to ${receiver}.${method}`);
      } else if (GLOBAL_RECEIVERS.has(receiver) && BLOCKED_CALLS.has(method)) {
        report(node, `call to ${receiver}.${method}`);
      }
    }
  };

  const visit = (node: ts.Node): void => {
    if (ts.isCallExpression(node)) {
      inspectCall(node);
    } else if (ts.isNewExpression(node)) {
      if (ts.isIdentifier(node.expression) && BLOCKED_CONSTRUCTORS.has(node.expression.text)) {
        report(node, `construction of ${node.expression.text}`);
      }
    } else if (ts.isImportDeclaration(node) || ts.isExportDeclaration(node)) {
      checkModule(node, node.moduleSpecifier, 'import');
    } else if (ts.isImportEqualsDeclaration(node) && ts.isExternalModuleReference(node.moduleReference)) {
      checkModule(node, node.moduleReference.expression, 'import');
    }
    ts.forEachChild(node, visit);
  };

  visit(source);
  return findings;
}
