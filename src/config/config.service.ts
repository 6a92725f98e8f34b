import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { Injectable } from '@nestjs/common';

@Injectable()
export class ConfigService {
  private readonly envConfig: Record<string, string>;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    // Try to load from .env file first
    const envFile = `.env.${env.NODE_ENV || 'development'}`;

    try {
      this.envConfig = dotenv.parse(fs.readFileSync(envFile));
    } catch {
      if (env.NODE_ENV !== 'test') {
        console.warn(`Failed to load ${envFile}, using process.env`);
      }
      this.envConfig = Object.fromEntries(
        Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined),
      );
    }
  }

  get(key: string): string {
    const value = this.envConfig[key];
    if (value === undefined) {
      throw new Error(`Configuration error: Missing required environment variable ${key}`);
    }
    return value;
  }

  getOptional(key: string, fallback: string): string {
    const value = this.envConfig[key];
    return value === undefined || value === '' ? fallback : value;
  }

  getNumber(key: string, fallback: number): number {
    const raw = this.envConfig[key];
    if (raw === undefined || raw === '') return fallback;
    const parsed = Number.parseInt(raw, 10);
    if (Number.isNaN(parsed)) {
      throw new Error(`Configuration error: ${key} must be an integer, got '${raw}'`);
    }
    return parsed;
  }
}
