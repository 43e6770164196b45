/**
 * Addresses of control-system inventory rows.
 *
 * The inventory reports MK2A digital inputs by word and bit shift, so the
 * engineering offset has to be rebuilt before the two address spaces line up.
 */

import type { Row } from '@pointrec/core';
import { cell, isBlank, toText } from '@pointrec/core';
import { noopLogger, type ReconLogger } from '../types/logger.js';
import {
  IEC101_PROTOCOL,
  deriveControlFunctionTag,
  formatGenericPointAddress,
  parseInteger,
  type ControlTag,
} from './codec.js';

function describe(row: Row): string {
  const parts = ['PO_RTU', 'Card', 'Word', 'Shift', 'Size'].map((c) => toText(cell(row, c)) ?? '');
  return `r${parts[0]}:c${parts[1]}:w${parts[2]}:b${parts[3]}:s${parts[4]}`;
}

/**
 * Engineering offset of an inventory row, as text.
 *
 * IEC rows use the word unchanged. MK2A rows: DI is `word*8+shift`,
 * DD is `floor((word*8+shift)/2)`, anything else is the word; the result
 * is then made 1-based.
 */
export function computeInventoryOffset(row: Row, logger: ReconLogger = noopLogger): string | null {
  const word = parseInteger(cell(row, 'Word'));

  if (cell(row, 'Protocol') === IEC101_PROTOCOL) {
    if (word === null) {
      logger.warn(`word is not an integer: ${describe(row)}`);
      return null;
    }
    return String(word);
  }

  if (word === null) {
    logger.warn(`word is not an integer: ${describe(row)}`);
    return null;
  }
  const shift = parseInteger(cell(row, 'Shift'));
  if (shift === null) {
    logger.warn(`shift is not an integer: ${describe(row)}`);
    return null;
  }

  let offset: number;
  switch (cell(row, 'POType')) {
    case 'DI':
      offset = word * 8 + shift;
      break;
    case 'DD':
      offset = Math.floor((word * 8 + shift) / 2);
      break;
    default:
      offset = word;
  }
  return String(offset + 1);
}

/**
 * Address of an inventory row. `RTU` (without the `_RTU` suffix), `GenericType`
 * and `Offset` must already be set. Setpoint outputs carry the `C` type tag so
 * they meet the engineering setpoint controls.
 */
export function deriveInventoryAddress(row: Row): string | null {
  const rtu = toText(cell(row, 'RTU'));
  if (rtu === null) return null;

  const genericType = cell(row, 'GenericType');
  const controlId = cell(row, 'ControlId');
  const ctrlTag: ControlTag = isBlank(controlId) ? '' : deriveControlFunctionTag(controlId, genericType);
  const typeTag = genericType === 'SETPOINT' ? 'C' : toText(genericType) ?? '';

  let key1: string | null;
  let key2: string | null;
  if (cell(row, 'Protocol') === IEC101_PROTOCOL) {
    key1 = toText(cell(row, 'CASDU'));
    const ioa = cell(row, 'IOA');
    const ioaInt = parseInteger(ioa);
    key2 = ioaInt === null ? toText(ioa) : String(ioaInt);
  } else {
    key1 = toText(cell(row, 'Card'));
    key2 = toText(cell(row, 'Offset'));
  }
  if (key1 === null || key2 === null) return null;

  return formatGenericPointAddress({
    rtu,
    rtuAddress: toText(cell(row, 'RTUAddress')) ?? '',
    key1,
    key2,
    ctrlTag,
    typeTag,
  });
}
