import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { GpuTelemetry, ProcessTelemetry } from '../types/telemetry';
import { TelemetryParseError } from './errors';
import {
  parseMemoryValue,
  parsePercentValue,
  parsePid,
  parsePowerValue,
  parseTemperatureValue,
} from '../utils/unit-utils';

type XmlNode = Record<string, unknown>;

const ROOT_TAG = 'nvidia_smi_log';

// Repeated elements that must stay arrays even when only one is present
const ARRAY_PATHS = new Set([
  `${ROOT_TAG}.gpu`,
  `${ROOT_TAG}.gpu.processes.process_info`,
]);

// Power draw/limit tags, newest driver layout first
const POWER_DRAW_TAGS = ['instant_power_draw', 'power_draw', 'average_power_draw'];
const POWER_LIMIT_TAGS = ['current_power_limit', 'power_limit', 'enforced_power_limit'];

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (_tagName: string, jPath: string) => ARRAY_PATHS.has(jPath),
});

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(node: XmlNode | undefined, key: string): XmlNode | undefined {
  const value = node?.[key];
  return isNode(value) ? value : undefined;
}

function children(node: XmlNode | undefined, key: string): XmlNode[] {
  const value = node?.[key];
  return Array.isArray(value) ? value.filter(isNode) : [];
}

function text(node: XmlNode | undefined, key: string): string {
  const value = node?.[key];
  return typeof value === 'string' ? value : '';
}

/**
 * First reading present (and not N/A) across the power blocks
 */
function firstReading(blocks: Array<XmlNode | undefined>, tags: string[]): string {
  for (const block of blocks) {
    for (const tag of tags) {
      const value = text(block, tag);
      if (value && value !== 'N/A') return value;
    }
  }
  return '';
}

function toProcessTelemetry(process: XmlNode): ProcessTelemetry {
  return {
    pid: parsePid(text(process, 'pid')),
    name: text(process, 'process_name'),
    used: parseMemoryValue(text(process, 'used_memory')),
  };
}

function toGpuTelemetry(gpu: XmlNode): GpuTelemetry {
  const memory = child(gpu, 'fb_memory_usage');
  const memoryTotal = parseMemoryValue(text(memory, 'total'));
  const memoryUsed = parseMemoryValue(text(memory, 'used'));

  // Drivers >= 530 report gpu_power_readings; older ones power_readings
  const powerBlocks = [child(gpu, 'gpu_power_readings'), child(gpu, 'power_readings')];

  return {
    id: text(gpu, '@_id'),
    name: text(gpu, 'product_name'),
    utilization: parsePercentValue(text(child(gpu, 'utilization'), 'gpu_util')),
    memory_used: memoryTotal > 0 ? Math.min(memoryUsed, memoryTotal) : memoryUsed,
    memory_total: memoryTotal,
    temperature: parseTemperatureValue(text(child(gpu, 'temperature'), 'gpu_temp')),
    power_usage: parsePowerValue(firstReading(powerBlocks, POWER_DRAW_TAGS)),
    power_limit: parsePowerValue(firstReading(powerBlocks, POWER_LIMIT_TAGS)),
    processes: children(child(gpu, 'processes'), 'process_info').map(toProcessTelemetry),
  };
}

/**
 * Parse `nvidia-smi -q -x` output into one entry per GPU, in the order
 * nvidia-smi enumerates them.
 *
 * Throws TelemetryParseError when the document is not well-formed XML or
 * has no nvidia_smi_log root. Individual fields that cannot be read
 * become 0 instead.
 */
export function parseSmiOutput(xml: string): GpuTelemetry[] {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new TelemetryParseError(`invalid XML at ${line}:${col}: ${msg}`);
  }

  let document: unknown;
  try {
    document = xmlParser.parse(xml);
  } catch (error) {
    throw new TelemetryParseError(`failed to parse XML: ${(error as Error).message}`);
  }

  if (!isNode(document) || !(ROOT_TAG in document)) {
    throw new TelemetryParseError(`missing <${ROOT_TAG}> root element`);
  }

  // An empty root (<nvidia_smi_log/>) parses as '' and simply has no GPUs
  return children(child(document, ROOT_TAG), 'gpu').map(toGpuTelemetry);
}
