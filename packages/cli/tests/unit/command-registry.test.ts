/**
 * Unit tests for Command Registry
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { ConfigurationError } from '@chartlane/utils';
import { CommandRegistry, commandRegistry } from '../../src/core/command-registry.js';
import type { PackageCommandModule } from '../../src/types/index.js';
import '../../src/commands/charts.js';
import '../../src/commands/integrity.js';

function module(packageName: string, commandNames: string[]): PackageCommandModule {
  return {
    packageName,
    description: `${packageName} commands`,
    commands: commandNames.map((name) => ({
      name,
      description: `${name} command`,
      schema: z.object({}),
      handler: async () => ({ success: true }),
      examples: [`chartlane ${packageName} ${name}`],
    })),
  };
}

describe('CommandRegistry', () => {
  let registry: CommandRegistry;

  beforeEach(() => {
    registry = new CommandRegistry();
  });

  it('registers a package and finds its commands', () => {
    registry.registerPackage(module('test', ['one', 'two']));

    expect(registry.getPackages()).toHaveLength(1);
    expect(registry.getCommand('test', 'two')?.description).toBe('two command');
    expect(registry.getCommand('test', 'three')).toBeUndefined();
  });

  it('throws on duplicate package registration', () => {
    registry.registerPackage(module('test', []));

    expect(() => registry.registerPackage(module('test', []))).toThrow('Package test is already registered');
  });

  it('throws on duplicate command names and leaves the package unregistered', () => {
    expect(() => registry.registerPackage(module('test', ['one', 'one']))).toThrow(ConfigurationError);
    expect(registry.getPackages()).toEqual([]);
  });

  it('renders package help with examples', () => {
    registry.registerPackage(module('test', ['one']));

    expect(registry.generatePackageHelp('test').split('\n')).toEqual([
      'test commands',
      '',
      'Commands:',
      `  ${'one'.padEnd(20)} one command`,
      '    Example: chartlane test one',
    ]);
    expect(registry.generatePackageHelp('missing')).toBe('Package missing not found');
  });
});

describe('commandRegistry', () => {
  it('holds every chartlane command', () => {
    const names = commandRegistry
      .getPackages()
      .flatMap((pkg) => pkg.commands.map((command) => `${pkg.packageName}.${command.name}`));

    expect(names).toEqual([
      'chart.load',
      'chart.entries',
      'integrity.show',
      'integrity.list',
      'integrity.seed',
      'integrity.reset',
    ]);
  });
});
