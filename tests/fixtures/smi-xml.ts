/**
 * Builders for `nvidia-smi -q -x` documents
 */

export interface SmiProcessFixture {
  pid: string;
  name: string;
  usedMemory: string;
}

export interface SmiGpuFixture {
  id?: string;
  productName?: string;
  gpuUtil?: string;
  memoryTotal?: string;
  memoryUsed?: string;
  gpuTemp?: string;
  powerDraw?: string;
  powerLimit?: string;
  // Pre-530 drivers: <power_readings> with <power_draw>/<power_limit>
  legacyPower?: boolean;
  processes?: SmiProcessFixture[];
}

function gpuXml(gpu: SmiGpuFixture, index: number): string {
  const id = gpu.id ?? `00000000:0${index + 1}:00.0`;
  const power = gpu.legacyPower
    ? `<power_readings>
        <power_draw>${gpu.powerDraw ?? '100.00 W'}</power_draw>
        <power_limit>${gpu.powerLimit ?? '300.00 W'}</power_limit>
      </power_readings>`
    : `<gpu_power_readings>
        <instant_power_draw>${gpu.powerDraw ?? '100.00 W'}</instant_power_draw>
        <current_power_limit>${gpu.powerLimit ?? '300.00 W'}</current_power_limit>
      </gpu_power_readings>`;
  const processes = (gpu.processes ?? [])
    .map(
      (process) => `<process_info>
          <pid>${process.pid}</pid>
          <type>C</type>
          <process_name>${process.name}</process_name>
          <used_memory>${process.usedMemory}</used_memory>
        </process_info>`
    )
    .join('\n');

  return `<gpu id="${id}">
      <product_name>${gpu.productName ?? 'Test GPU'}</product_name>
      <fb_memory_usage>
        <total>${gpu.memoryTotal ?? '16384 MiB'}</total>
        <reserved>0 MiB</reserved>
        <used>${gpu.memoryUsed ?? '1024 MiB'}</used>
        <free>15360 MiB</free>
      </fb_memory_usage>
      <utilization>
        <gpu_util>${gpu.gpuUtil ?? '37 %'}</gpu_util>
        <memory_util>5 %</memory_util>
      </utilization>
      <temperature>
        <gpu_temp>${gpu.gpuTemp ?? '45 C'}</gpu_temp>
      </temperature>
      ${power}
      <processes>
        ${processes}
      </processes>
    </gpu>`;
}

export function buildSmiXml(gpus: SmiGpuFixture[]): string {
  return `<?xml version="1.0" ?>
<nvidia_smi_log>
  <timestamp>Mon Jan  1 00:00:00 2024</timestamp>
  <driver_version>550.00</driver_version>
  <attached_gpus>${gpus.length}</attached_gpus>
  ${gpus.map(gpuXml).join('\n')}
</nvidia_smi_log>
`;
}
