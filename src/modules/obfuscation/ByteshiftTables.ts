/**
 * Byteshift key catalogs.
 *
 * Built once on first access and frozen; safe to share between concurrent
 * pipelines because nothing ever writes to them afterwards.
 */
import type { ByteshiftTable } from '../../types/index.js';

const BASE_GAME_KEY = [0x02, 0x13, 0x0a, 0x08, 0x01, 0x07, 0x02, 0x02];

const DLC_KEY = [
  0x14, 0x05, 0x0f, 0x0b, 0x01, 0x08, 0x02, 0x03,
  0x03, 0x08, 0x04, 0x03, 0x01, 0x04, 0x07, 0x08,
];

function table(bytes: number[], offset: number, mask: number): ByteshiftTable {
  return Object.freeze({ bytes: Object.freeze([...bytes]), offset, mask });
}

function luauKey(version: number, variant: boolean): string {
  return `${version}:${variant ? 'dlc' : 'base'}`;
}

let luauTables: ReadonlyMap<string, ByteshiftTable> | undefined;
let luajitTables: ReadonlyMap<number, ByteshiftTable> | undefined;

function getLuauTables(): ReadonlyMap<string, ByteshiftTable> {
  luauTables ??= new Map([
    // dataS/scripts
    [luauKey(3, false), table(BASE_GAME_KEY, 0, 0x07)],
    [luauKey(6, false), table(BASE_GAME_KEY, 0, 0x07)],
    // DLC scripts
    [luauKey(3, true), table(DLC_KEY, 0, 0x0f)],
    [luauKey(6, true), table(DLC_KEY, 0, 0x0f)],
  ]);
  return luauTables;
}

function getLuajitTables(): ReadonlyMap<number, ByteshiftTable> {
  luajitTables ??= new Map([
    [3, table([0x14, 0x0b, 0x09, 0x02, 0x08, 0x03, 0x03, 0x03], 4, 0x07)],
    [
      4,
      table(
        [0x06, 0x10, 0x0c, 0x02, 0x09, 0x03, 0x04, 0x04, 0x09, 0x05, 0x04, 0x02, 0x05, 0x08, 0x09, 0x15],
        4,
        0x0f
      ),
    ],
  ]);
  return luajitTables;
}

export function getLuauTable(version: number, variant: boolean): ByteshiftTable | undefined {
  return getLuauTables().get(luauKey(version, variant));
}

export function getLuajitTable(version: number): ByteshiftTable | undefined {
  return getLuajitTables().get(version);
}
