/**
 * Reply-keyboard vocabulary.
 *
 * Buttons arrive as ordinary text messages, so these strings double as the
 * dispatcher's command table. Changing a label changes what users must send.
 */
export const LABELS = {
  income: "💰 ثبت درآمد",
  expense: "💸 ثبت هزینه",
  summary: "📊 گزارش مالی",
  editMenu: "✏️ ویرایش",
  debtorsMenu: "👥 بدهکاران",

  editTransaction: "✏️ ویرایش تراکنش",
  deleteTransaction: "🗑️ حذف تراکنش",
  deleteAll: "🗑️ حذف همه",
  backToMenu: "🔙 بازگشت به منو",

  addDebt: "➕ ثبت بدهی",
  deleteDebt: "🗑️ حذف بدهی",
  listDebts: "📋 لیست بدهی‌ها",

  cancel: "❌ لغو",
  skip: "⏭️ رد کردن",
  yes: "✅ بله",
  no: "❌ خیر",

  fieldAmount: "مبلغ",
  fieldDescription: "توضیحات",
} as const;

export type LabelKey = keyof typeof LABELS;

// Compared after trim + toLowerCase
const CANCEL_TOKENS = new Set(["/cancel", "cancel", "لغو", LABELS.cancel]);
const AFFIRMATIVE_TOKENS = new Set(["بله", "yes", "y", LABELS.yes]);
const SKIP_TOKENS = new Set([LABELS.skip, "رد کردن", "skip"]);

function normalizeToken(text: string): string {
  return text.trim().toLowerCase();
}

export function isCancelToken(text: string): boolean {
  return CANCEL_TOKENS.has(normalizeToken(text));
}

export function isAffirmative(text: string): boolean {
  return AFFIRMATIVE_TOKENS.has(normalizeToken(text));
}

export function isSkipToken(text: string): boolean {
  return SKIP_TOKENS.has(normalizeToken(text));
}

/**
 * Reverse lookup: which button was pressed, if any.
 */
export function matchLabel(text: string): LabelKey | null {
  const trimmed = text.trim();
  for (const [key, label] of Object.entries(LABELS)) {
    if (label === trimmed && isLabelKey(key)) return key;
  }
  return null;
}

function isLabelKey(key: string): key is LabelKey {
  return key in LABELS;
}
