import { DEFAULT_DOMAIN, SourceUnavailableError, errorMessage } from '@policy-sync/core';
import type { PolicyRule, ResourceFilter, RoleLink } from '@policy-sync/core';
import type { ConfigLoader } from '../config/mode-config-loader';
import type { Logger } from '../utils/logger';
import { BasePolicyLoader } from './loader';
import type { FetchedPolicies } from './loader';

export interface MalformedLine {
  line: number;
  text: string;
  reason: string;
}

export interface ParsedPolicyFile {
  rules: PolicyRule[];
  roleLinks: RoleLink[];
  malformed: MalformedLine[];
}

const INTEGER = /^-?\d+$/;

/**
 * Parses the line-oriented rule format:
 *
 * ```
 * # comment
 * p, <roleId>, <resourceCode>, <actionCode>
 * g, <subject>, <role>[, <domain>]
 * ```
 *
 * Rule ids are 1-based line numbers.
 */
export function parsePolicyFile(content: string): ParsedPolicyFile {
  const rules: PolicyRule[] = [];
  const roleLinks: RoleLink[] = [];
  const malformed: MalformedLine[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((raw, index) => {
    const text = raw.trim();
    const line = index + 1;
    if (!text || text.startsWith('#')) return;

    const parts = text.split(',').map(part => part.trim());
    const kind = parts[0];

    if (kind === 'p') {
      const [, roleId = '', resourceCode = '', actionCode = ''] = parts;
      if (parts.length < 4) {
        malformed.push({ line, text, reason: 'expected p,roleId,resourceCode,actionCode' });
      } else if (!INTEGER.test(roleId)) {
        malformed.push({ line, text, reason: `invalid role ID format: ${roleId}` });
      } else if (!resourceCode || !actionCode) {
        malformed.push({ line, text, reason: 'resource and action codes are required' });
      } else {
        rules.push({ id: line, roleId: parseInt(roleId, 10), resourceCode, actionCode });
      }
      return;
    }

    if (kind === 'g') {
      const [, subject = '', role = '', domain = DEFAULT_DOMAIN] = parts;
      if (!subject || !role) {
        malformed.push({ line, text, reason: 'expected g,subject,role[,domain]' });
      } else {
        roleLinks.push({ subject, role, domain: domain || DEFAULT_DOMAIN });
      }
      return;
    }

    malformed.push({ line, text, reason: `unknown record type: ${kind}` });
  });

  return { rules, roleLinks, malformed };
}

/**
 * Loads policy rules from a static file in the mode-scoped config directory.
 * Filtering happens after parsing.
 */
export class ResourcePolicyLoader extends BasePolicyLoader {
  readonly sourceType = 'resource' as const;

  constructor(
    private readonly configLoader: ConfigLoader,
    private readonly resourcePath: string,
    resources: ResourceFilter,
    logger: Logger,
  ) {
    super(resources, logger);
  }

  describe(): string {
    return `resource: ${this.configLoader.resolvePath(this.resourcePath)}`;
  }

  protected async fetchPolicies(): Promise<FetchedPolicies> {
    let content: string;
    try {
      content = await this.configLoader.readConfig(this.resourcePath);
    } catch (error) {
      this.logger.error('Failed to read policy resource', {
        err: error,
        resourcePath: this.resourcePath,
        filteredResources: this.resources.toArray(),
      });
      throw new SourceUnavailableError(
        `Resource policy loading failed: ${this.resourcePath}: ${errorMessage(error)}`,
        'resource',
        error,
      );
    }

    const parsed = parsePolicyFile(content);
    for (const entry of parsed.malformed) {
      this.malformed(`Skipping malformed policy line ${entry.line}: ${entry.reason}`, entry.text);
    }

    return { rules: parsed.rules, roleLinks: parsed.roleLinks, skipped: parsed.malformed.length };
  }
}
