/**
 * Legato definition files rendered from the system catalog.
 *
 * A system becomes one .sdef that includes the framework default, plus one
 * .mdef per kernel module under `kmod/`. Modules without a supplied source
 * get a minimal one that only logs its load and unload.
 */

import type { AppDefinition, KernelModuleDefinition, SystemDefinition } from '../types/device-state.js';

export const KERNEL_MODULE_DIR = 'kmod';

const INDENT = '    ';

function block(name: string, entries: string[], depth = 0): string[] {
  const pad = INDENT.repeat(depth);
  return [`${pad}${name}:`, `${pad}{`, ...entries.map(entry => `${pad}${INDENT}${entry}`), `${pad}}`];
}

export function renderModuleDefinition(module: KernelModuleDefinition, source: string): string {
  const lines = [...block('sources', [source]), '', `load: ${module.load}`];
  if (module.requires.length > 0) {
    const requires = module.requires.map(name => `${INDENT}${INDENT}$CURDIR/${name}.mdef`);
    lines.push('', 'requires:', '{', `${INDENT}kernelModules:`, `${INDENT}{`, ...requires, `${INDENT}}`, '}');
  }
  return `${lines.join('\n')}\n`;
}

export function renderModuleSource(name: string): string {
  const symbol = name.replace(/[^A-Za-z0-9_]/g, '_');
  return [
    '#include <linux/init.h>',
    '#include <linux/module.h>',
    '',
    `static int __init ${symbol}_init(void)`,
    '{',
    `    pr_info("${name} loaded\\n");`,
    '    return 0;',
    '}',
    '',
    `static void __exit ${symbol}_exit(void)`,
    '{',
    `    pr_info("${name} unloaded\\n");`,
    '}',
    '',
    `module_init(${symbol}_init);`,
    `module_exit(${symbol}_exit);`,
    '',
    'MODULE_LICENSE("GPL");',
    `MODULE_DESCRIPTION("Lifecycle test module ${name}");`,
    '',
  ].join('\n');
}

/** `appDefinition` maps each app to the .adef the system should build */
export function renderSystemDefinition(
  system: SystemDefinition,
  appDefinition: (app: AppDefinition) => string,
): string {
  const lines = ['#include "$LEGATO_ROOT/default.sdef"'];
  if (system.modules.length > 0) {
    const modules = system.modules.map(module => `$CURDIR/${KERNEL_MODULE_DIR}/${module.name}.mdef`);
    lines.push('', ...block('kernelModules', modules));
  }
  if (system.apps.length > 0) {
    const apps = system.apps.flatMap(app => [appDefinition(app), '{', `${INDENT}start: ${app.start}`, '}']);
    lines.push('', ...block('apps', apps));
  }
  return `${lines.join('\n')}\n`;
}
