import { Instruction, type OpKind, type Stage, type StationType } from './instruction.js';
import { type CPUConfig, type ResolvedCPUConfig, validateConfig } from './config.js';
import { CycleLimitError, PipelineDeadlockError, PipelineInvariantError, ProgramError } from './exceptions.js';
import { FreeList } from '../rename/free_list.js';
import { MapTable } from '../rename/map_table.js';
import { PhysicalRegister, NO_REG } from '../rename/physical_register.js';
import { type ReadinessListener, publishReady } from '../rename/broadcast.js';
import { ReservationStation } from '../pipeline/reservation_station.js';
import { ReorderBuffer } from '../pipeline/rob.js';
import { StageQueue } from '../pipeline/stage_queue.js';

export type ProgramInstruction = {
  kind: OpKind;
  src1: number;
  src2: number;
  dst: number;
};

export type TraceEvent = {
  cycle: number;
  stage: Stage;
  seq: number;
  text: string; // instruction state right after the stage acted on it
  before?: string; // dispatch only: state before renaming
};

export type DispatchStallReason = 'rob-full' | 'station-busy' | 'no-free-register';

export type CPUStats = {
  cycles: number;
  retired: number;
  ipc: number;
  issued: number;
  completed: number;
  dispatchStalls: Record<DispatchStallReason, number>;
};

export type RegisterAccounting = {
  free: number;
  mapped: number; // distinct physical registers in the speculative map table
  inFlightOld: number; // Told values held by ROB entries
  pendingRelease: number; // retired Told values waiting for the next cycle
  total: number;
};

export class CPU {
  readonly config: ResolvedCPUConfig;
  readonly width: number;

  readonly freeList: FreeList;
  readonly mapTable: MapTable;
  readonly archMapTable: MapTable;
  readonly rob: ReorderBuffer;
  readonly stations: ReservationStation[] = [];

  readonly decodeQueue: StageQueue;
  readonly dispatchQueue: StageQueue;
  readonly executeQueue: StageQueue;
  readonly completeQueue: StageQueue;

  private readonly program: Instruction[] = [];
  private readonly readinessListeners: ReadinessListener[];
  private readonly latencyByType = new Map<StationType, number>();
  private releasePending: PhysicalRegister[] = [];

  cycle = 0;
  private fetchPtr = 0;
  private isFetching = true;
  private progress = false;

  private issuedCount = 0;
  private completedCount = 0;
  private retiredCount = 0;
  private readonly stalls: Record<DispatchStallReason, number> = { 'rob-full': 0, 'station-busy': 0, 'no-free-register': 0 };

  // Observers; purely diagnostic, nothing in the pipeline reads them back.
  onTrace?: (ev: TraceEvent) => void;
  onCycleEnd?: (cpu: CPU) => void;

  constructor(config: CPUConfig) {
    this.config = validateConfig(config);
    const { numArchRegs, numPhysRegs, robEntries, width } = this.config;
    this.width = width;
    this.freeList = new FreeList(numArchRegs, numPhysRegs);
    this.mapTable = new MapTable('Mapping Table', numArchRegs, numPhysRegs);
    this.archMapTable = new MapTable('Architectural Map Table', numArchRegs, numPhysRegs);
    this.rob = new ReorderBuffer(robEntries);

    const perType = new Map<StationType, number>();
    for (const spec of this.config.stations) {
      const n = perType.get(spec.type) ?? 0;
      perType.set(spec.type, n + 1);
      this.stations.push(new ReservationStation(spec.name ?? `${spec.type}${n}`, spec.type, spec.execTime));
      if (!this.latencyByType.has(spec.type)) this.latencyByType.set(spec.type, spec.execTime);
    }
    this.readinessListeners = [...this.stations, this.mapTable];

    this.decodeQueue = new StageQueue('decode', width);
    this.dispatchQueue = new StageQueue('dispatch', width);
    this.executeQueue = new StageQueue('execute', width);
    // Holds instructions waiting out their latency; when full, execute stalls.
    this.completeQueue = new StageQueue('complete', width);
  }

  get instructions(): readonly Instruction[] {
    return this.program;
  }

  addInstruction(kind: OpKind, srcOp1: number, srcOp2: number, dstOp: number): Instruction {
    if (this.cycle > 0) throw new ProgramError('instructions cannot be added once simulation has started');
    for (const [label, r] of [['src1', srcOp1], ['src2', srcOp2], ['dst', dstOp]] as const) {
      if (r === NO_REG) continue;
      if (!Number.isInteger(r) || r < 0 || r >= this.config.numArchRegs) {
        throw new ProgramError(`I${this.program.length}: ${label} register r${r} outside 0..${this.config.numArchRegs - 1}`);
      }
    }
    if (kind === 'STORE' && dstOp !== NO_REG) {
      throw new ProgramError(`I${this.program.length}: STORE cannot have a destination register`);
    }
    const inst = new Instruction(this.program.length, kind, srcOp1, srcOp2, dstOp);
    this.program.push(inst);
    return inst;
  }

  loadProgram(list: readonly ProgramInstruction[]): void {
    for (const p of list) this.addInstruction(p.kind, p.src1, p.src2, p.dst);
  }

  isFinished(): boolean {
    return this.program.every(i => i.retired);
  }

  // Runs until every instruction retires. A cycle in which nothing moves is a
  // permanent stall and aborts the run.
  simulate(): CPUStats {
    while (!this.isFinished()) {
      const limit = this.config.maxCycles;
      if (limit !== null && this.cycle >= limit) throw new CycleLimitError(limit, this.dumpState());
      const at = this.cycle;
      if (!this.step()) throw new PipelineDeadlockError(at, this.dumpState());
    }
    return this.stats;
  }

  step(): boolean {
    this.progress = false;
    // Registers freed at retire last cycle become allocatable now.
    for (const r of this.releasePending) this.freeList.addRegister(r);
    this.releasePending = [];
    // Reverse pipeline order, so each stage sees its consumer already drained.
    this.retire();
    this.complete();
    this.execute();
    this.issue();
    this.dispatch();
    this.decode();
    this.fetch();
    const progressed = this.progress;
    this.onCycleEnd?.(this);
    this.cycle++;
    return progressed;
  }

  private emit(stage: Stage, inst: Instruction, before?: string): void {
    this.progress = true;
    if (!this.onTrace) return;
    const ev: TraceEvent = { cycle: this.cycle, stage, seq: inst.seq, text: inst.toString() };
    if (before !== undefined) ev.before = before;
    this.onTrace(ev);
  }

  private fetch(): void {
    for (let i = 0; i < this.width && this.isFetching; i++) {
      const inst = this.program[this.fetchPtr];
      if (!inst) {
        this.isFetching = false;
        break;
      }
      if (!this.decodeQueue.push(inst)) break;
      inst.stamp('fetch', this.cycle);
      this.emit('fetch', inst);
      this.fetchPtr++;
      if (this.fetchPtr >= this.program.length) this.isFetching = false;
    }
  }

  private decode(): void {
    for (let i = 0; i < this.width; i++) {
      const inst = this.decodeQueue.front();
      if (!inst) break;
      // Leave it queued when the next stage is backed up.
      if (!this.dispatchQueue.push(inst)) break;
      this.decodeQueue.pop();
      inst.stamp('decode', this.cycle);
      this.emit('decode', inst);
    }
  }

  private dispatch(): void {
    for (let i = 0; i < this.width; i++) {
      const inst = this.dispatchQueue.front();
      if (!inst) break;
      if (!this.rob.hasFreeEntry()) {
        this.stalls['rob-full']++;
        break;
      }
      const rsIndex = this.stations.findIndex(rs => rs.type === inst.stationType && !rs.busy);
      const rs = this.stations[rsIndex];
      if (!rs) {
        this.stalls['station-busy']++;
        break;
      }
      if (inst.hasDestination() && !this.freeList.hasRegister()) {
        this.stalls['no-free-register']++;
        break;
      }

      const before = inst.toString();
      if (inst.srcOp1 !== NO_REG) inst.srcPhysReg1 = this.mapTable.getMapping(inst.srcOp1);
      if (inst.srcOp2 !== NO_REG) inst.srcPhysReg2 = this.mapTable.getMapping(inst.srcOp2);
      let T = PhysicalRegister.none();
      let Told = PhysicalRegister.none();
      if (inst.hasDestination()) {
        T = this.freeList.popRegister();
        Told = this.mapTable.getMapping(inst.dstOp);
        this.mapTable.setMapping(inst.dstOp, T);
        inst.dstPhysReg = T.copy();
      }
      inst.renamed = true;

      this.rob.addInstruction(inst, T, Told);
      rs.allocate(inst);
      inst.stationIndex = rsIndex;

      this.dispatchQueue.pop();
      inst.stamp('dispatch', this.cycle);
      this.emit('dispatch', inst, before);
    }
  }

  private issue(): void {
    const candidates: ReservationStation[] = this.stations.filter(rs => {
      const inst = rs.getInst();
      return inst !== null && rs.isReadyToExecute() && !inst.issued;
    });
    if (this.config.issuePolicy === 'oldest-first') {
      candidates.sort((a, b) => (a.getInst()?.seq ?? 0) - (b.getInst()?.seq ?? 0));
    }
    let issued = 0;
    for (const rs of candidates) {
      const inst = rs.getInst();
      if (!inst) continue;
      if (issued >= this.width) return;
      if (!this.executeQueue.push(inst)) return;
      issued++;
      this.issuedCount++;
      inst.stamp('issue', this.cycle);
      this.emit('issue', inst);
    }
  }

  private execute(): void {
    for (let i = 0; i < this.width; i++) {
      const inst = this.executeQueue.front();
      if (!inst) break;
      if (!this.completeQueue.push(inst)) break;
      this.executeQueue.pop();
      const rs = this.stationOf(inst);
      inst.stamp('execute', this.cycle);
      inst.execTime = this.latencyFor(inst.stationType);
      // The station is reusable at once; latency is spent in the complete queue.
      rs.free();
      inst.stationIndex = null;
      this.emit('execute', inst);
    }
  }

  private complete(): void {
    // Queue capacity is `width`, so every due instruction completes this cycle.
    const done = this.completeQueue.retain(inst => {
      const start = inst.timing.execute;
      return start === null || this.cycle < start + inst.execTime;
    });
    for (const inst of done) {
      if (inst.hasDestination()) {
        publishReady(this.readinessListeners, inst.dstPhysReg.regNum);
        inst.dstPhysReg.ready = true;
      }
      this.completedCount++;
      inst.stamp('complete', this.cycle);
      this.emit('complete', inst);
    }
    // Waiting out a latency counts as forward progress.
    if (!this.completeQueue.isEmpty()) this.progress = true;
  }

  private retire(): void {
    for (let i = 0; i < this.width; i++) {
      const head = this.rob.getHead();
      if (!head || !head.inst.completed) break;
      this.rob.retireHeadInstruction();
      const inst = head.inst;
      if (inst.hasDestination()) {
        this.archMapTable.setMapping(inst.dstOp, new PhysicalRegister(head.T.regNum, true));
        this.releasePending.push(head.Told);
      }
      this.retiredCount++;
      inst.stamp('retire', this.cycle);
      this.emit('retire', inst);
    }
  }

  private stationOf(inst: Instruction): ReservationStation {
    const rs = inst.stationIndex === null ? undefined : this.stations[inst.stationIndex];
    if (!rs || rs.getInst() !== inst) {
      throw new PipelineInvariantError(`I${inst.seq} reached execute without its reservation station`);
    }
    return rs;
  }

  private latencyFor(type: StationType): number {
    const l = this.latencyByType.get(type);
    if (l === undefined) throw new PipelineInvariantError(`no ${type} station configured`);
    return l;
  }

  get stats(): CPUStats {
    return {
      cycles: this.cycle,
      retired: this.retiredCount,
      ipc: this.cycle > 0 ? this.retiredCount / this.cycle : 0,
      issued: this.issuedCount,
      completed: this.completedCount,
      dispatchStalls: { ...this.stalls },
    };
  }

  registerAccounting(): RegisterAccounting {
    const free = this.freeList.size;
    const mapped = new Set(this.mapTable.mappedRegisters()).size;
    const inFlightOld = this.rob.entries().filter(e => !e.Told.isNone()).length;
    const pendingRelease = this.releasePending.length;
    return { free, mapped, inFlightOld, pendingRelease, total: free + mapped + inFlightOld + pendingRelease };
  }

  dumpState(): string {
    const lines: string[] = [];
    lines.push(`[OoO CPU cycle=${this.cycle} fetched=${this.fetchPtr}/${this.program.length} retired=${this.retiredCount}]`);
    lines.push(this.rob.toString());
    lines.push('Reservation Stations : [');
    for (const rs of this.stations) lines.push(`\t${rs.toString()}`);
    lines.push(']');
    lines.push(this.mapTable.toString());
    lines.push(this.archMapTable.toString());
    lines.push(this.freeList.toString());
    lines.push(`Pending Release : [${this.releasePending.map(r => `p${r.regNum}`).join(', ')}]`);
    for (const q of [this.decodeQueue, this.dispatchQueue, this.executeQueue, this.completeQueue]) lines.push(q.toString());
    lines.push(`LSQ entries : ${this.config.numLSQEntries}`);
    return lines.join('\n');
  }
}
