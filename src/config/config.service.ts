import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { Injectable, Logger } from '@nestjs/common';

@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly envConfig: Record<string, string>;

  constructor(envFile?: string) {
    // Try to load from .env file first
    const file = envFile ?? (process.env.NODE_ENV === 'production'
      ? '.env.production'
      : '.env.development');

    try {
      this.envConfig = dotenv.parse(fs.readFileSync(file));
    } catch (err) {
      this.logger.warn(`Failed to load ${file}, using process.env`);
      this.envConfig = Object.fromEntries(
        Object.entries(process.env).filter(
          (entry): entry is [string, string] => entry[1] !== undefined,
        ),
      );
    }
  }

  get(key: string, fallback?: string): string {
    const value = this.envConfig[key];
    if (value === undefined) {
      if (fallback !== undefined) return fallback;
      throw new Error(`Configuration error: Missing required environment variable ${key}`);
    }
    return value;
  }

  getNumber(key: string, fallback: number): number {
    const parsed = Number.parseInt(this.get(key, String(fallback)), 10);
    return Number.isNaN(parsed) ? fallback : parsed;
  }
}
