import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { existsSync } from 'node:fs';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';

import {
  ALERT_RULE_IDS,
  AlertRuleId,
  AlertRuleOverride,
  AlertRuleSet,
  AlertRulesDocument,
  NodeRuleOverrides,
} from './alert-rules.types';
import { PersistenceError } from '../errors/engine-errors';
import { TaskQueue } from '../utils/task-queue';

const overrideSchema = z
  .object({
    enabled: z.boolean().optional(),
    threshold: z.number().finite().optional(),
  })
  .strict();

const nodeOverridesSchema = z.record(z.enum(ALERT_RULE_IDS), overrideSchema);

const documentSchema = z.object({
  defaults: nodeOverridesSchema.optional(),
  nodes: z.record(z.string(), nodeOverridesSchema).optional(),
});

export function buildDefaultRuleSet(offlineThresholdSeconds: number): AlertRuleSet {
  return {
    node_offline: { enabled: true, threshold: offlineThresholdSeconds },
    low_battery: { enabled: true, threshold: 20 },
    low_voltage: { enabled: false, threshold: 3.2 },
    high_voltage: { enabled: false, threshold: 4.3 },
    low_temperature: { enabled: false, threshold: 0 },
    high_temperature: { enabled: false, threshold: 40 },
    motion: { enabled: false, threshold: 0 },
  };
}

function mergeRules(base: AlertRuleSet, overrides: NodeRuleOverrides | undefined): AlertRuleSet {
  if (!overrides) {
    return base;
  }
  const merged = { ...base };
  ALERT_RULE_IDS.forEach((ruleId) => {
    const override = overrides[ruleId];
    if (override) {
      merged[ruleId] = { ...merged[ruleId], ...override };
    }
  });
  return merged;
}

/**
 * Rule set per node: configured defaults, then file-level defaults, then per-node overrides.
 * Overrides live in a JSON document that is rewritten whenever one is changed.
 */
@Injectable()
export class AlertRulesService implements OnModuleInit {
  private readonly logger = new Logger(AlertRulesService.name);
  private readonly rulesPath: string;
  private readonly baseRules: AlertRuleSet;
  private readonly writeQueue = new TaskQueue(1);
  private document: AlertRulesDocument = {};

  constructor(configService: ConfigService) {
    this.rulesPath = configService.get<string>('alerts.rulesFile', 'config/alert-rules.json');
    this.baseRules = buildDefaultRuleSet(
      configService.get<number>('alerts.offlineThresholdSeconds', 600),
    );
  }

  async onModuleInit(): Promise<void> {
    await this.load();
  }

  async load(): Promise<void> {
    if (!existsSync(this.rulesPath)) {
      this.logger.log(`No alert rules file at ${this.rulesPath}; using defaults`);
      return;
    }
    try {
      const raw = await readFile(this.rulesPath, 'utf-8');
      const parsed = documentSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        this.logger.warn(
          `Ignoring invalid alert rules file ${this.rulesPath}: ${parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join(', ')}`,
        );
        return;
      }
      this.document = parsed.data;
      this.logger.log(
        `Loaded alert rule overrides for ${Object.keys(this.document.nodes ?? {}).length} nodes`,
      );
    } catch (error) {
      const failure = new PersistenceError('rules-load', this.rulesPath, error);
      this.logger.warn(failure.message);
    }
  }

  getRules(nodeId: string): AlertRuleSet {
    return mergeRules(mergeRules(this.baseRules, this.document.defaults), this.document.nodes?.[nodeId]);
  }

  getOverrides(): AlertRulesDocument {
    return this.document;
  }

  /** Takes effect at once; a failed save is logged and the file catches up on the next change. */
  async setRuleOverride(nodeId: string, ruleId: AlertRuleId, override: AlertRuleOverride): Promise<AlertRuleSet> {
    const nodes = { ...(this.document.nodes ?? {}) };
    const current = nodes[nodeId] ?? {};
    nodes[nodeId] = { ...current, [ruleId]: { ...current[ruleId], ...override } };
    this.document = { ...this.document, nodes };
    await this.persist();
    return this.getRules(nodeId);
  }

  async removeNode(nodeId: string): Promise<void> {
    if (!this.document.nodes?.[nodeId]) {
      return;
    }
    const nodes = { ...this.document.nodes };
    delete nodes[nodeId];
    this.document = { ...this.document, nodes };
    await this.persist();
  }

  private async persist(): Promise<void> {
    const snapshot = JSON.stringify(this.document, null, 2);
    try {
      await this.writeQueue.add(() => this.writeDocument(snapshot));
    } catch (error) {
      this.logger.error(error instanceof Error ? error.message : String(error));
    }
  }

  private async writeDocument(snapshot: string): Promise<void> {
    const tempPath = `${this.rulesPath}.tmp`;
    try {
      await mkdir(dirname(this.rulesPath), { recursive: true });
      await writeFile(tempPath, snapshot, 'utf-8');
      await rename(tempPath, this.rulesPath);
      this.logger.log(`Persisted alert rule overrides to ${this.rulesPath}`);
    } catch (error) {
      throw new PersistenceError('rules-save', this.rulesPath, error);
    }
  }
}
