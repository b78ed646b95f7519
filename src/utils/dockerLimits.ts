export interface EnvironmentLimits {
  memory: string;      // e.g., '2g'
  memorySwap: string;  // same as memory = no swap
  cpus: number;
  pidsLimit: number;
  network: 'bridge' | 'none' | 'host';
}

export const DEFAULT_LIMITS: EnvironmentLimits = {
  memory: '2g',
  memorySwap: '2g',
  cpus: 2,
  pidsLimit: 256,
  network: 'bridge',
};

export const limitsFromConfig = (docker: {
  memory: string;
  cpus: number;
  pidsLimit: number;
  network: EnvironmentLimits['network'];
}): EnvironmentLimits => ({
  memory: docker.memory,
  memorySwap: docker.memory,
  cpus: docker.cpus,
  pidsLimit: docker.pidsLimit,
  network: docker.network,
});

export const toDockerRunArgs = (limits: EnvironmentLimits): string[] => [
  `--memory=${limits.memory}`,
  `--memory-swap=${limits.memorySwap}`,
  `--cpus=${limits.cpus}`,
  `--pids-limit=${limits.pidsLimit}`,
  `--network=${limits.network}`,
  '--security-opt=no-new-privileges:true',
];

export const toLabelArgs = (labels: Record<string, string>): string[] =>
  Object.entries(labels).map(([key, value]) => `--label=${key}=${value}`);
