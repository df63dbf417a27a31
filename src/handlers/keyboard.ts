import { Keyboard } from "grammy";
import { LABELS } from "../config/labels";
import type { KeyboardKind } from "../types/conversation";

/** Button rows per keyboard */
const LAYOUTS: Record<KeyboardKind, string[][]> = {
  main: [
    [LABELS.income, LABELS.expense],
    [LABELS.summary, LABELS.editMenu],
    [LABELS.debtorsMenu],
  ],
  edit: [
    [LABELS.editTransaction, LABELS.deleteTransaction],
    [LABELS.deleteAll, LABELS.backToMenu],
  ],
  debtors: [
    [LABELS.addDebt, LABELS.deleteDebt],
    [LABELS.listDebts, LABELS.backToMenu],
  ],
  cancel: [[LABELS.cancel]],
  cancel_skip: [[LABELS.cancel, LABELS.skip]],
  confirm: [[LABELS.yes, LABELS.no]],
  edit_fields: [[LABELS.fieldAmount, LABELS.fieldDescription], [LABELS.backToMenu]],
};

export function buildKeyboard(kind: KeyboardKind): Keyboard {
  const keyboard = new Keyboard();
  LAYOUTS[kind].forEach((row, index) => {
    if (index > 0) keyboard.row();
    for (const label of row) keyboard.text(label);
  });
  return keyboard.resized();
}
