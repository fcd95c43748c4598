/**
 * Health and Status Endpoints
 * Liveness, readiness and metrics for the generation and rendering services
 */

import { Request, Response } from 'express';
import { Settings, validateConfiguration } from '../../config/settings.js';
import type { LLMClient } from '../../content-engine/utils/llm-client.js';
import type { DocumentRenderer } from '../../content-engine/m4-renderer/src/document-renderer.js';
import type { SecurityMiddleware } from '../security/middleware.js';

export type HealthState = 'healthy' | 'degraded' | 'unhealthy';

export interface ComponentHealth {
  component: string;
  status: HealthState;
  message?: string;
}

export interface HealthStatus {
  status: HealthState;
  timestamp: string;
  uptime: number;
  version: string;
  components: ComponentHealth[];
}

export interface HealthDependencies {
  llm: LLMClient;
  renderer: DocumentRenderer;
  security: SecurityMiddleware;
  settings: Settings;
  now?: () => number;
}

/**
 * Health monitoring service
 */
export class HealthMonitor {
  private deps: HealthDependencies;
  private now: () => number;
  private startTime: number;

  constructor(deps: HealthDependencies) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
    this.startTime = this.now();
  }

  checkComponents(): ComponentHealth[] {
    const components: ComponentHealth[] = [];

    const config = validateConfiguration(this.deps.settings);
    components.push(config.valid
      ? { component: 'configuration', status: 'healthy' }
      : { component: 'configuration', status: 'unhealthy', message: config.errors.join('; ') });

    const llm = this.deps.llm.getHealth();
    components.push(llm.healthy
      ? { component: 'generation', status: 'healthy', message: `model ${llm.model}` }
      : { component: 'generation', status: 'unhealthy', message: 'No API key configured' });

    // Illustrations are optional; without a service they are skipped
    components.push(this.deps.settings.IMAGE_API_URL
      ? { component: 'illustrations', status: 'healthy' }
      : { component: 'illustrations', status: 'degraded', message: 'IMAGE_API_URL not set; images are skipped' });

    components.push({ component: 'renderer', status: 'healthy' });

    return components;
  }

  getHealth(): HealthStatus {
    const components = this.checkComponents();
    let status: HealthState = 'healthy';
    if (components.some(c => c.status === 'unhealthy')) {
      status = 'unhealthy';
    } else if (components.some(c => c.status === 'degraded')) {
      status = 'degraded';
    }

    return {
      status,
      timestamp: new Date(this.now()).toISOString(),
      uptime: this.now() - this.startTime,
      version: process.env.npm_package_version || '1.0.0',
      components
    };
  }

  getMetrics() {
    return {
      generation: this.deps.llm.getMetrics(),
      renderCache: this.deps.renderer.getCacheMetrics(),
      security: this.deps.security.getSecurityStats(),
      process: {
        pid: process.pid,
        uptime: process.uptime(),
        memoryUsage: process.memoryUsage()
      }
    };
  }
}

/**
 * Express handlers bound to a monitor
 */
export function createHealthEndpoints(monitor: HealthMonitor) {
  return {
    health: (req: Request, res: Response): void => {
      const health = monitor.getHealth();
      res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
    },

    ready: (req: Request, res: Response): void => {
      const health = monitor.getHealth();
      const ready = health.status !== 'unhealthy';
      res.status(ready ? 200 : 503).json({
        ready,
        timestamp: health.timestamp,
        components: health.components.filter(c => c.status === 'unhealthy')
      });
    },

    live: (req: Request, res: Response): void => {
      res.status(200).json({ alive: true, timestamp: new Date().toISOString() });
    },

    metrics: (req: Request, res: Response): void => {
      res.status(200).json(monitor.getMetrics());
    }
  };
}
