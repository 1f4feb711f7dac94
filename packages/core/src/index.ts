export * from './cpu/exceptions.js';
export * from './cpu/instruction.js';
export * from './cpu/config.js';
export * from './cpu/cpu.js';
export * from './rename/physical_register.js';
export * from './rename/broadcast.js';
export * from './rename/free_list.js';
export * from './rename/map_table.js';
export * from './pipeline/reservation_station.js';
export * from './pipeline/rob.js';
export * from './pipeline/stage_queue.js';
export * from './program/parse.js';
export * from './report/timing_report.js';
