import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import { AuditConfig } from '../contracts/types'
import { AuditConfigSchema } from '../contracts/schemas'
import { debugLog } from '../logging/debugLog'

export class ConfigLoader {
  private static DEFAULT_CONFIG: AuditConfig = AuditConfigSchema.parse({})

  private config: AuditConfig

  constructor(private configPath?: string) {
    this.config = this.loadConfig()
  }

  private findConfigFile(): string | null {
    const configNames = ['.fsaudit.config.json', 'fsaudit.config.json']

    // Start from current directory and walk up
    let currentDir = process.cwd()

    while (currentDir !== path.parse(currentDir).root) {
      for (const configName of configNames) {
        const configPath = path.join(currentDir, configName)
        if (fs.existsSync(configPath)) {
          return configPath
        }
      }
      currentDir = path.dirname(currentDir)
    }

    return null
  }

  private loadConfig(): AuditConfig {
    const configPath = this.configPath ?? this.findConfigFile()

    if (!configPath || !fs.existsSync(configPath)) {
      return ConfigLoader.DEFAULT_CONFIG
    }

    try {
      const rawConfig = fs.readFileSync(configPath, 'utf-8')
      const parsedConfig: unknown = JSON.parse(rawConfig)

      // Validate and apply defaults
      const validated = AuditConfigSchema.parse(parsedConfig)
      debugLog({ event: 'config_loaded', configPath })
      return validated
    } catch (error) {
      if (error instanceof z.ZodError) {
        console.error(`Invalid config at ${configPath}:`, error.errors)
      } else if (error instanceof SyntaxError) {
        console.error(`Invalid JSON in config file ${configPath}`)
      } else {
        console.error(`Error loading config from ${configPath}:`, error)
      }

      return ConfigLoader.DEFAULT_CONFIG
    }
  }

  getConfig(): AuditConfig {
    return this.config
  }

  reloadConfig(): void {
    this.config = this.loadConfig()
  }
}
