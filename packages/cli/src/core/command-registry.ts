/**
 * Command Registry - command groups and their definitions
 */

import type { CommandDefinition, PackageCommandModule } from '../types/index.js';
import { ConfigurationError } from '@chartlane/utils';

export class CommandRegistry {
  private packages: Map<string, PackageCommandModule> = new Map();
  private commands: Map<string, CommandDefinition> = new Map();

  /**
   * Register a command group
   */
  registerPackage(module: PackageCommandModule): void {
    if (this.packages.has(module.packageName)) {
      throw new ConfigurationError(
        `Package ${module.packageName} is already registered`,
        'packageName',
        { packageName: module.packageName }
      );
    }

    const incoming = new Map<string, CommandDefinition>();
    for (const command of module.commands) {
      const fullName = `${module.packageName}.${command.name}`;
      if (this.commands.has(fullName) || incoming.has(fullName)) {
        throw new ConfigurationError(`Command ${fullName} is already registered`, 'commandName', {
          packageName: module.packageName,
          commandName: command.name,
        });
      }
      incoming.set(fullName, command);
    }

    for (const [fullName, command] of incoming) {
      this.commands.set(fullName, command);
    }
    this.packages.set(module.packageName, module);
  }

  /**
   * Get a command by full name (package.command)
   */
  getCommand(packageName: string, commandName: string): CommandDefinition | undefined {
    return this.commands.get(`${packageName}.${commandName}`);
  }

  getPackages(): PackageCommandModule[] {
    return Array.from(this.packages.values());
  }

  /**
   * Help text for one group, examples included
   */
  generatePackageHelp(packageName: string): string {
    const module = this.packages.get(packageName);
    if (!module) {
      return `Package ${packageName} not found`;
    }

    const lines: string[] = [module.description, '', 'Commands:'];
    for (const command of module.commands) {
      lines.push(`  ${command.name.padEnd(20)} ${command.description}`);
      for (const example of command.examples ?? []) {
        lines.push(`    Example: ${example}`);
      }
    }

    return lines.join('\n');
  }
}

/**
 * Global command registry instance
 */
export const commandRegistry = new CommandRegistry();
