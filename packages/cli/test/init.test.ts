/**
 * Tests for `roster init`
 *
 * Validates:
 * - config.yaml is written and loads back as the defaults
 * - an existing config is kept unless --force
 * - .gitignore gains the database and log patterns once
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig } from '@roster/core';
import { initProject, generateConfigYAML } from '../src/commands/init.js';

describe('roster init', () => {
  let projectDir: string;
  const configPath = () => join(projectDir, '.roster', 'config.yaml');

  beforeEach(() => {
    projectDir = mkdtempSync(join(tmpdir(), 'roster-init-'));
  });

  afterEach(() => {
    rmSync(projectDir, { recursive: true, force: true });
  });

  it('should write a config that loads back as the defaults', () => {
    const result = initProject(projectDir);

    assert.deepStrictEqual(result, { configPath: configPath(), written: true, gitignoreUpdated: false });
    assert.ok(existsSync(configPath()));

    const warnings: string[] = [];
    const config = loadConfig(projectDir, { warn: (msg) => warnings.push(msg) }, {});
    assert.deepStrictEqual(warnings, []);
    assert.strictEqual(config.mode, 'development');
    assert.strictEqual(config.server.port, 4000);
    assert.strictEqual(config.server.graphqlEndpoint, '/graphql');
    assert.strictEqual(config.database.path, join(projectDir, '.roster', 'data'));
    assert.strictEqual(config.logging.file, undefined);
  });

  it('should keep an existing config without --force', () => {
    initProject(projectDir);
    writeFileSync(configPath(), 'server:\n  port: 5000\n');

    const result = initProject(projectDir);

    assert.strictEqual(result.written, false);
    assert.strictEqual(readFileSync(configPath(), 'utf-8'), 'server:\n  port: 5000\n');
  });

  it('should overwrite an existing config with --force', () => {
    initProject(projectDir);
    writeFileSync(configPath(), 'server:\n  port: 5000\n');

    const result = initProject(projectDir, { force: true });

    assert.strictEqual(result.written, true);
    assert.strictEqual(readFileSync(configPath(), 'utf-8'), generateConfigYAML());
  });

  it('should add Roster entries to an existing .gitignore once', () => {
    const gitignorePath = join(projectDir, '.gitignore');
    writeFileSync(gitignorePath, 'node_modules\n');

    assert.strictEqual(initProject(projectDir).gitignoreUpdated, true);
    assert.strictEqual(
      readFileSync(gitignorePath, 'utf-8'),
      'node_modules\n\n# Roster\n.roster/data/\n.roster/*.log\n'
    );

    assert.strictEqual(initProject(projectDir, { force: true }).gitignoreUpdated, false);
  });

  it('should not create a .gitignore', () => {
    initProject(projectDir);
    assert.strictEqual(existsSync(join(projectDir, '.gitignore')), false);
  });
});
