import os from 'node:os';
import type { AgentManager, AgentMetrics } from '../services/agent-manager.js';
import { errorMessage } from '../utils/errors.js';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

/** Resolves when the dependency answers, rejects otherwise. */
export type DependencyCheck = () => Promise<void>;

export interface HealthMetrics {
  status: HealthStatus;
  timestamp: string;
  uptime: number;
  memory: {
    used: number;
    total: number;
    percentage: number;
  };
  cpu: {
    usage: number;
    loadAverage: number[];
  };
  dependencies: Record<string, 'up' | 'down'>;
  agents: AgentMetrics;
  errors: string[];
}

export interface HealthThresholds {
  memory: number;
  responseTimeMs: number;
  errorRate: number;
}

export class HealthMonitor {
  private readonly startTime: number;
  private readonly thresholds: HealthThresholds;

  constructor(
    private readonly agentManager: AgentManager,
    private readonly dependencies: Record<string, DependencyCheck> = {},
    thresholds: Partial<HealthThresholds> = {}
  ) {
    this.startTime = Date.now();
    this.thresholds = {
      memory: 0.9,
      responseTimeMs: 20000,
      errorRate: 0.1,
      ...thresholds,
    };
  }

  async checkDependencies(): Promise<Record<string, 'up' | 'down'>> {
    const results: Record<string, 'up' | 'down'> = {};
    await Promise.all(
      Object.entries(this.dependencies).map(async ([name, check]) => {
        try {
          await check();
          results[name] = 'up';
        } catch (error) {
          console.warn(`Health check for ${name} failed:`, errorMessage(error));
          results[name] = 'down';
        }
      })
    );
    return results;
  }

  /**
   * Get comprehensive health metrics
   */
  async getHealthMetrics(): Promise<HealthMetrics> {
    const memoryUsage = process.memoryUsage();
    const agents = this.agentManager.getMetrics();
    const dependencies = await this.checkDependencies();
    const problems = this.findProblems(memoryUsage, agents, dependencies);

    return {
      status: this.determineHealthStatus(problems, dependencies),
      timestamp: new Date().toISOString(),
      uptime: Date.now() - this.startTime,
      memory: {
        used: memoryUsage.heapUsed,
        total: memoryUsage.heapTotal,
        percentage: memoryUsage.heapUsed / memoryUsage.heapTotal,
      },
      cpu: {
        usage: process.cpuUsage().user / 1000000, // seconds
        loadAverage: os.loadavg(),
      },
      dependencies,
      agents,
      errors: problems,
    };
  }

  private findProblems(
    memoryUsage: NodeJS.MemoryUsage,
    agents: AgentMetrics,
    dependencies: Record<string, 'up' | 'down'>
  ): string[] {
    const problems: string[] = [];
    const memoryPercentage = memoryUsage.heapUsed / memoryUsage.heapTotal;
    const totalRequests = agents.messageCount + agents.errorCount;
    const errorRate = totalRequests > 0 ? agents.errorCount / totalRequests : 0;

    if (memoryPercentage > this.thresholds.memory) {
      problems.push(`High memory usage: ${(memoryPercentage * 100).toFixed(1)}%`);
    }
    if (agents.averageResponseTime > this.thresholds.responseTimeMs) {
      problems.push(`High response time: ${Math.round(agents.averageResponseTime)}ms`);
    }
    if (errorRate > this.thresholds.errorRate) {
      problems.push(`High error rate: ${(errorRate * 100).toFixed(1)}%`);
    }
    for (const [name, state] of Object.entries(dependencies)) {
      if (state === 'down') {
        problems.push(`Dependency unavailable: ${name}`);
      }
    }
    return problems;
  }

  /**
   * A dependency being down makes the service unhealthy; other problems only
   * degrade it.
   */
  determineHealthStatus(problems: string[], dependencies: Record<string, 'up' | 'down'>): HealthStatus {
    if (Object.values(dependencies).includes('down')) {
      return 'unhealthy';
    }
    return problems.length === 0 ? 'healthy' : 'degraded';
  }

  /**
   * Check if system is ready to handle requests
   */
  async isReady(): Promise<boolean> {
    const dependencies = await this.checkDependencies();
    return !Object.values(dependencies).includes('down');
  }

  getMemoryUsageMB(): { used: number; total: number; percentage: number } {
    const memoryUsage = process.memoryUsage();
    return {
      used: Math.round(memoryUsage.heapUsed / 1024 / 1024),
      total: Math.round(memoryUsage.heapTotal / 1024 / 1024),
      percentage: memoryUsage.heapUsed / memoryUsage.heapTotal,
    };
  }

  getResourceRecommendations(metrics: HealthMetrics): string[] {
    const recommendations: string[] = [];

    if (metrics.memory.percentage > 0.7) {
      recommendations.push('Consider increasing memory allocation or lowering the session TTL');
    }
    if (metrics.agents.averageResponseTime > 10000) {
      recommendations.push('Agent turns are slow; check model latency and tool upstreams');
    }
    if (Object.values(metrics.dependencies).includes('down')) {
      recommendations.push('Restore unavailable dependencies before routing traffic here');
    }

    return recommendations;
  }
}
