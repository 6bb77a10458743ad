/**
 * Edge logic snippets.
 *
 * Renders the snippets whose content depends on the enforcement containers
 * (ban rule, captcha routing) and on the captcha cookie settings. Rendering
 * is deterministic: identical inputs give byte-identical output, so an
 * unchanged digest means no remote write.
 */

import { createHash } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { CaptchaConfig } from '../domain/config';
import { DecisionAction } from '../domain/decision';
import { ContainerKind, EnforcementContainer } from '../domain/service';
import { EdgeSnippet } from '../edge/edge-api';

/** Nearest `templates` directory above this module, from sources or from dist/. */
function findTemplateDir(start: string): string {
  let dir = start;
  for (;;) {
    const candidate = path.join(dir, 'templates');
    if (fs.existsSync(path.join(candidate, 'ban_rule.vcl'))) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) throw new Error(`No templates directory found above ${start}`);
    dir = parent;
  }
}

let templateDir: string | undefined;

const templateCache = new Map<string, string>();

/** Read a template from the templates directory. */
export function loadTemplate(name: string): string {
  const cached = templateCache.get(name);
  if (cached !== undefined) return cached;
  templateDir ??= findTemplateDir(__dirname);
  const content = fs.readFileSync(path.join(templateDir, `${name}.vcl`), 'utf8');
  templateCache.set(name, content);
  return content;
}

/** Substitute `{{KEY}}` placeholders. Unknown placeholders are an error. */
export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (_match, key: string) => {
    const value = vars[key];
    if (value === undefined) throw new Error(`Template variable ${key} has no value`);
    return value;
  });
}

/** Condition matching every container that enforces `action`. */
export function buildCondition(action: DecisionAction, containers: EnforcementContainer[]): string {
  const listKind = action === DecisionAction.Ban ? ContainerKind.BlockList : ContainerKind.CaptchaList;
  const byIndex = (a: EnforcementContainer, b: EnforcementContainer) => a.index - b.index;
  const conditions: string[] = [];

  for (const c of containers.filter((c) => c.kind === listKind).sort(byIndex)) {
    conditions.push(`(client.ip ~ ${c.name})`);
  }
  for (const c of containers.filter((c) => c.kind === ContainerKind.CountryList).sort(byIndex)) {
    conditions.push(`(table.lookup(${c.name}, client.geo.country_code, "") == "${action}")`);
  }
  for (const c of containers.filter((c) => c.kind === ContainerKind.AsnList).sort(byIndex)) {
    conditions.push(`(table.lookup(${c.name}, std.itoa(client.as.number), "") == "${action}")`);
  }

  return conditions.length > 0 ? conditions.join(' || ') : 'false';
}

/** Inputs of snippet rendering for one service. */
export interface SnippetInput {
  namePrefix: string;
  containers: EnforcementContainer[];
  captcha?: CaptchaConfig;
  captchaSecret: string;
}

/** Render every snippet the engine owns on a service. */
export function renderSnippets(input: SnippetInput): EdgeSnippet[] {
  const { namePrefix, containers, captcha } = input;
  const snippets: EdgeSnippet[] = [
    {
      name: `${namePrefix}_ban_rule`,
      type: 'recv',
      priority: 10,
      content: renderTemplate(loadTemplate('ban_rule'), {
        CONDITION: buildCondition(DecisionAction.Ban, containers),
      }),
    },
  ];

  if (captcha) {
    const cookieName = `${namePrefix}_captcha`;
    snippets.push(
      {
        name: `${namePrefix}_captcha_rule`,
        type: 'recv',
        priority: 11,
        content: renderTemplate(loadTemplate('captcha_rule'), {
          CONDITION: buildCondition(DecisionAction.Captcha, containers),
          COOKIE_NAME: cookieName,
          SECRET: input.captchaSecret,
          SITE_KEY: captcha.siteKey,
        }),
      },
      {
        name: `${namePrefix}_captcha_cookie`,
        type: 'deliver',
        priority: 10,
        content: renderTemplate(loadTemplate('captcha_cookie'), {
          COOKIE_NAME: cookieName,
          SECRET: input.captchaSecret,
          COOKIE_EXPIRY: String(captcha.cookieExpirySeconds),
        }),
      },
    );
  }

  return snippets;
}

/** sha256 digest of snippet content. */
export function snippetDigest(snippet: EdgeSnippet): string {
  return createHash('sha256')
    .update(`${snippet.type}:${snippet.priority}:${snippet.content}`)
    .digest('hex');
}
