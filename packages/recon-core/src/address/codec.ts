/**
 * Address Codec
 *
 * Canonical identity of a telecontrol point, shared by the engineering
 * export and the control-system inventory:
 *
 *   [(RTU:RTUAddress):Key1:Key2-CtrlTag TypeTag]
 *
 * Key1/Key2 are Card/Word for MK2A RTUs and CASDU/IOA for IEC60870-101,
 * where the IOA packs the two raw address fields into one 32-bit value.
 */

import type { CellValue, Row } from '@pointrec/core';
import { cell, isBlank, toText } from '@pointrec/core';
import { noopLogger, type ReconLogger } from '../types/logger.js';

export type ControlTag = '' | '0' | '1' | '2';

export const MK2A_PROTOCOL = 'MK2A';
export const IEC101_PROTOCOL = 'IEC60870-101';

/** Generic types carried by control records; their addresses use the `C` type tag */
const CONTROL_TYPES = new Set(['CTRL', 'SETPOINT']);

const MAX_IOA_PART = 0xffff;

export interface AddressParts {
  rtu: string;
  rtuAddress: string;
  key1: string;
  key2: string;
  ctrlTag: string;
  typeTag: string;
}

export interface DerivedAddress {
  CASDU: CellValue;
  IOA: string | null;
  IOA1: string | null;
  IOA2: string | null;
  GenericPointAddress: string | null;
}

function assertIoaPart(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_IOA_PART) {
    throw new RangeError(`${name} must be an integer in 0..65535, got ${value}`);
  }
}

/**
 * Pack two 16-bit address fields into one information-object address
 */
export function combineIoa(ioa1: number, ioa2: number): number {
  assertIoaPart('ioa1', ioa1);
  assertIoaPart('ioa2', ioa2);
  return ((ioa1 << 16) | ioa2) >>> 0;
}

/**
 * Inverse of {@link combineIoa}
 */
export function splitIoa(ioa: number): [number, number] {
  if (!Number.isInteger(ioa) || ioa < 0 || ioa > 0xffffffff) {
    throw new RangeError(`ioa must be an unsigned 32-bit integer, got ${ioa}`);
  }
  return [ioa >>> 16, ioa & MAX_IOA_PART];
}

/**
 * Parse a cell holding an integer. Numbers must be whole; text must be digits only.
 */
export function parseInteger(value: CellValue | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === 'boolean') return null;
  const text = value.trim();
  return /^[+-]?\d+$/.test(text) ? Number.parseInt(text, 10) : null;
}

/**
 * Collapse a protocol-specific control identifier into `0`, `1` or `2`
 */
export function deriveControlFunctionTag(
  rawControlId: CellValue | undefined,
  genericType: CellValue | undefined
): Exclude<ControlTag, ''> {
  if (genericType === 'SETPOINT') return '2';
  return toText(rawControlId ?? null) === '1' ? '1' : '0';
}

export function formatRtuId(rtu: CellValue | undefined, rtuAddress: CellValue | undefined): string {
  return `(${toText(rtu ?? null) ?? ''}:${toText(rtuAddress ?? null) ?? ''})`;
}

export function formatGenericPointAddress(parts: AddressParts): string {
  return `[(${parts.rtu}:${parts.rtuAddress}):${parts.key1}:${parts.key2}-${parts.ctrlTag} ${parts.typeTag}]`;
}

const ADDRESS_PATTERN = /^\[\(([^:()]*):([^()]*)\):([^:]*):([^:]*)-([012]?) (\S+)\]$/;

/**
 * Split an address back into its fields, or `null` when it does not follow the grammar
 */
export function parseGenericPointAddress(text: string): AddressParts | null {
  const match = ADDRESS_PATTERN.exec(text);
  if (!match) return null;
  const [, rtu = '', rtuAddress = '', key1 = '', key2 = '', ctrlTag = '', typeTag = ''] = match;
  return { rtu, rtuAddress, key1, key2, ctrlTag, typeTag };
}

function keyText(value: CellValue): string {
  return toText(value) ?? '';
}

/**
 * Address fields for one row of the engineering export (POINT, ANALOG, CTRL or SETPNT tab).
 *
 * MK2A rows address by Card:Word. Every other protocol is treated as IEC60870-101:
 * Card and Word are packed into the IOA and the address uses CASDU:IOA. When Card or
 * Word is not a 16-bit integer the address is `null` and the row is logged.
 */
export function deriveGenericPointAddress(
  row: Row,
  logger: ReconLogger = noopLogger
): DerivedAddress {
  const genericType = cell(row, 'GenericType');
  const isControl = typeof genericType === 'string' && CONTROL_TYPES.has(genericType);
  const typeTag = isControl ? 'C' : keyText(genericType);
  const ctrlFunc = cell(row, 'CtrlFunc');
  const ctrlTag: ControlTag = isControl && !isBlank(ctrlFunc)
    ? deriveControlFunctionTag(ctrlFunc, genericType)
    : '';

  const rtu = keyText(cell(row, 'RTU'));
  const rtuAddress = keyText(cell(row, 'RTUAddress'));

  if (cell(row, 'Protocol') === MK2A_PROTOCOL) {
    return {
      CASDU: null,
      IOA: null,
      IOA1: null,
      IOA2: null,
      GenericPointAddress: formatGenericPointAddress({
        rtu,
        rtuAddress,
        key1: keyText(cell(row, 'Card')),
        key2: keyText(cell(row, 'Word')),
        ctrlTag,
        typeTag,
      }),
    };
  }

  const casdu = cell(row, 'CASDU');
  const ioa1 = parseInteger(cell(row, 'Card'));
  const ioa2 = parseInteger(cell(row, 'Word'));
  if (
    ioa1 === null || ioa2 === null ||
    ioa1 < 0 || ioa1 > MAX_IOA_PART || ioa2 < 0 || ioa2 > MAX_IOA_PART
  ) {
    logger.warn(
      `Word is not an integer: r${rtu}:c${keyText(cell(row, 'Card'))}:w${keyText(cell(row, 'Word'))} (${keyText(genericType)})`
    );
    return { CASDU: casdu, IOA: null, IOA1: null, IOA2: null, GenericPointAddress: null };
  }

  const ioa = combineIoa(ioa1, ioa2);
  return {
    CASDU: casdu,
    IOA: String(ioa),
    IOA1: String(ioa1),
    IOA2: String(ioa2),
    GenericPointAddress: formatGenericPointAddress({
      rtu,
      rtuAddress,
      key1: keyText(casdu),
      key2: String(ioa),
      ctrlTag,
      typeTag,
    }),
  };
}
