import dotenv from 'dotenv';

import { parse } from './common/env-parser';
import { DEFAULT_MEMORY_SIZE } from './common/constants';

dotenv.config({ path: ['.env.test', '.env.local', '.env'] });

interface VmConf {
    memorySize: number;
    traceEnabled: boolean;
}

export const vmConf: VmConf = {
    memorySize: parse.natural('VM_MEMORY_SIZE', DEFAULT_MEMORY_SIZE),
    traceEnabled: parse.boolean('VM_TRACE', true),
};

// Read on demand: a run without tracing never needs it.
export function traceCapacity(): number {
    return parse.natural('TRACE_CAPACITY');
}
