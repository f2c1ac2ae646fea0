import { DEFAULT_MEMORY_SIZE, INSTRUCTION_SIZE, START_ADDRESS } from './common/constants';
import { VmError } from './common/errors';
import { Logger, silentLogger } from './common/logger';
import { CommitmentContext } from './zk/commitment';
import { LinearMemory } from './vm/memory';
import { loadProgram } from './vm/program';
import { VM } from './vm/vm';

export interface RunOptions {
    memorySize?: number;
    trace?: boolean;
    // Padded length of the trace commitment; unpadded when absent.
    capacity?: number;
    maxTicks?: number;
    logger?: Logger;
}

export interface RunResult {
    vm: VM;
    ticks: number;
    halted: boolean;
    fault?: VmError;
    commitments: CommitmentContext;
}

export function executeProgram(program: number[], options: RunOptions = {}): RunResult {
    const logger = options.logger ?? silentLogger;
    const memorySize = options.memorySize ?? DEFAULT_MEMORY_SIZE;
    const programEnd = START_ADDRESS + program.length * INSTRUCTION_SIZE;
    if (memorySize < programEnd)
        throw new VmError('ConfigError', `memory size ${memorySize} cannot hold a program ending at ${programEnd}`);

    const memory = new LinearMemory(memorySize);
    loadProgram(memory, program);

    const commitments = new CommitmentContext();
    commitments.setPublicProgram(program);

    const vm = new VM(memory, { trace: options.trace, logger });
    let fault: VmError | undefined;
    try {
        vm.run(options.maxTicks);
    } catch (e) {
        if (!(e instanceof VmError)) throw e;
        fault = e;
    }
    logger.log(`Executed ${vm.ticks} instructions, halted: ${vm.halted}`);

    commitments.setPublicOutput(vm.registers, memory);
    if (vm.trace) {
        commitments.commitTrace(vm.trace.entries, memory, options.capacity);
    }

    return { vm, ticks: vm.ticks, halted: vm.halted, fault, commitments };
}
