// Telemetry as served by the collector on GET /gpu-info

export interface ProcessTelemetry {
  pid: number;
  name: string;
  used: number;           // Bytes
  user?: string;          // Resolved owner (only when process ranking is enabled)
}

export interface GpuTelemetry {
  id: string;             // PCI bus id reported by nvidia-smi
  name: string;           // Product name
  utilization: number;    // Percentage (0-100)
  memory_used: number;    // Bytes
  memory_total: number;   // Bytes
  temperature: number;    // Celsius
  power_usage: number;    // Milliwatts
  power_limit: number;    // Milliwatts
  processes: ProcessTelemetry[];
}

export interface HostTelemetry {
  node_name: string;
  timestamp: string;      // ISO timestamp
  gpus: GpuTelemetry[];
}
