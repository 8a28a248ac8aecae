import { z } from 'zod';
import {
  latencyDatapoint,
  throughputDownDatapoint,
  throughputUpDatapoint,
  type Datapoint,
} from '@linetest/domain';

const isoTimestamp = z.string().refine((s) => !Number.isNaN(Date.parse(s)), {
  message: 'invalid timestamp',
});

const measuredValue = z.number().finite().nonnegative().nullable();

export const PersistedDatapointSchema = z.object({
  kind: z.enum(['Latency', 'ThroughputUp', 'ThroughputDown']),
  value: measuredValue,
  at: isoTimestamp,
});

export const PersistedSessionSchema = z.array(PersistedDatapointSchema);

export type PersistedDatapoint = z.infer<typeof PersistedDatapointSchema>;

export function encodeDatapoint(dp: Datapoint): PersistedDatapoint {
  return { kind: dp.kind, value: dp.value, at: dp.at.toISOString() };
}

export function decodeDatapoint(raw: PersistedDatapoint): Datapoint {
  const at = new Date(raw.at);
  switch (raw.kind) {
    case 'Latency':
      return latencyDatapoint(raw.value, at);
    case 'ThroughputDown':
      return throughputDownDatapoint(raw.value, at);
    case 'ThroughputUp':
      return throughputUpDatapoint(raw.value, at);
  }
}
