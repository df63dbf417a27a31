import { LABELS } from "../config/labels";
import { toSolarDate } from "./date";
import type { Debt, DebtListing, Transaction, TransactionSummary } from "../types/ledger";
import type { MenuKind } from "../types/conversation";

const SEPARATOR = "➖".repeat(10);
const PLACEHOLDER = "-";

/**
 * Whole Toman with comma grouping: 1500000.75 → "1,500,000 تومان".
 * Fractions are truncated, never rounded.
 */
export function formatToman(amount: number): string {
  // `|| 0` folds -0 (e.g. trunc(-0.4)) into 0
  const whole = Math.trunc(amount) || 0;
  return `${whole.toLocaleString("en-US")} تومان`;
}

function directionLabel(isIncome: boolean): string {
  return isIncome ? "درآمد" : "هزینه";
}

function directionGlyph(isIncome: boolean): string {
  return isIncome ? "💰" : "💸";
}

// ── Menus & prompts ──

export const WELCOME_MESSAGE = [
  "👋 به ربات حسابداری شخصی خوش آمدید!",
  "",
  "📝 دستورات موجود:",
  "",
  `💰 ثبت درآمد: دکمه '${LABELS.income}' را بزنید، سپس مبلغ و توضیحات را وارد کنید`,
  `💸 ثبت هزینه: دکمه '${LABELS.expense}' را بزنید، سپس مبلغ و توضیحات را وارد کنید`,
  `📊 گزارش مالی: دکمه '${LABELS.summary}' را بزنید`,
  `✏️ ویرایش: دکمه '${LABELS.editMenu}' را بزنید، برای ویرایش یا حذف تراکنش‌ها`,
  `👥 بدهکاران: دکمه '${LABELS.debtorsMenu}' را بزنید، برای مدیریت بدهی‌ها`,
  "",
  "📌 نکات:",
  "- مبالغ به تومان وارد شوند",
  "- برای تایید از 'بله' یا 'yes' استفاده کنید",
  "- برای لغو هر مرحله /cancel یا 'لغو' را بفرستید",
  "- تاریخ شمسی به صورت خودکار ثبت می‌شود",
].join("\n");

export function menuPrompt(menu: MenuKind): string {
  return menu === "main"
    ? "لطفا یکی از گزینه‌های زیر را انتخاب کنید:"
    : "لطفا عملیات مورد نظر را انتخاب کنید:";
}

export const OPERATION_CANCELLED = "❌ عملیات لغو شد.";
export const INVALID_AMOUNT = "❌ لطفا یک عدد معتبر وارد کنید:";
export const GENERIC_FAILURE = "⚠️ خطایی رخ داد. لطفا دوباره تلاش کنید.";
export const UNKNOWN_COMMAND_IN_FLOW =
  "❌ این دستور در این مرحله پشتیبانی نمی‌شود. برای لغو /cancel را بفرستید.";
export const RATE_LIMITED = "⏳ تعداد پیام‌ها زیاد است. لطفا کمی صبر کنید.";

// ── Transactions ──

export function amountPrompt(isIncome: boolean): string {
  return `${directionGlyph(isIncome)} لطفا مبلغ ${directionLabel(isIncome)} را وارد کنید:`;
}

export const DESCRIPTION_PROMPT = "📝 لطفا توضیحات این تراکنش را وارد کنید:";
export const TRANSACTION_CANCELLED = "تراکنش لغو شد.";
export const TRANSACTION_SAVE_FAILED = "❌ خطایی در ثبت تراکنش رخ داد.";
export const TRANSACTION_NOT_FOUND = "❌ تراکنش با این شناسه یافت نشد.";
export const INVALID_TRANSACTION_ID = "❌ شناسه تراکنش باید یک عدد باشد.";
export const NO_TRANSACTIONS = "هنوز تراکنشی ثبت نشده است.";
export const NOTHING_TO_DELETE = "❌ هیچ تراکنشی برای حذف وجود ندارد.";

export function missingIdMessage(command: string): string {
  return `❌ لطفا شناسه تراکنش را وارد کنید.\nمثال: /${command} 123`;
}

export function formatTransactionConfirmation(
  isIncome: boolean,
  amount: number,
  description: string,
  date: Date
): string {
  return [
    `لطفا ${directionLabel(isIncome)} زیر را تایید کنید:`,
    "",
    `مبلغ: ${formatToman(amount)}`,
    `توضیحات: ${description}`,
    `تاریخ شمسی: ${toSolarDate(date)}`,
    "",
    "آیا صحیح است؟ (بله/خیر)",
  ].join("\n");
}

export function formatTransactionReceipt(t: Transaction): string {
  return [
    `✅ ${directionLabel(t.isIncome)} با موفقیت ثبت شد!`,
    `شناسه: ${t.id}`,
    `مبلغ: ${formatToman(t.amount)}`,
    `توضیحات: ${t.description}`,
    `تاریخ شمسی: ${toSolarDate(t.recordedAt)}`,
  ].join("\n");
}

/** "شناسه / glyph amount - description / date" block used in lists */
export function formatTransactionLine(t: Transaction): string {
  return [
    `شناسه: ${t.id}`,
    `${directionGlyph(t.isIncome)} ${formatToman(t.amount)} - ${t.description}`,
    `تاریخ شمسی: ${toSolarDate(t.recordedAt)}`,
  ].join("\n");
}

export function formatSummary(summary: TransactionSummary): string {
  const lines = [
    "📊 خلاصه مالی",
    "",
    `کل درآمد: ${formatToman(summary.totalIncome)}`,
    `کل هزینه: ${formatToman(summary.totalExpense)}`,
    `موجودی: ${formatToman(summary.balance)}`,
    "",
    "تراکنش‌های اخیر:",
  ];
  for (const t of summary.recent) {
    lines.push(formatTransactionLine(t), "");
  }
  return lines.join("\n").trimEnd();
}

export function formatEditPrompt(t: Transaction): string {
  return `چه بخشی از تراکنش زیر را می‌خواهید ویرایش کنید؟\n\n${formatTransactionLine(t)}`;
}

export function formatTransactionDeleted(t: Transaction): string {
  return [
    "✅ تراکنش با موفقیت حذف شد.",
    `شناسه: ${t.id}`,
    `${directionGlyph(t.isIncome)} ${formatToman(t.amount)} - ${t.description}`,
  ].join("\n");
}

export function formatDeletedCount(count: number): string {
  return `✅ ${count} تراکنش با موفقیت حذف شد.`;
}

export const EDIT_USAGE = "✏️ برای ویرایش، شناسه تراکنش را بفرستید.\nمثال: /edit_tr 123";
export const DELETE_USAGE = "🗑️ برای حذف، شناسه تراکنش را بفرستید.\nمثال: /del_tr 123";

// ── Debts ──

export const DEBTOR_NAME_PROMPT = "👤 لطفا نام بدهکار را وارد کنید:";
export const DEBT_DESCRIPTION_PROMPT = "📝 لطفا توضیحات بدهی را وارد کنید (اختیاری):";
export const DEBT_CODE_PROMPT = "🔑 لطفا شناسه بدهی را وارد کنید:";
export const DEBT_CANCELLED = "ثبت بدهی لغو شد.";
export const DEBT_SAVE_FAILED = "❌ خطایی در ثبت بدهی رخ داد.";
export const DEBT_DELETE_FAILED = "❌ خطایی در حذف بدهی رخ داد.";
export const DEBT_NOT_FOUND = "❌ بدهی با این شناسه یافت نشد.";
export const NO_DEBTS = "هیچ بدهی ثبت نشده است.";

export function formatDebtorCodeAssigned(debtorName: string, debtorCode: string): string {
  return [
    `👤 نام بدهکار: ${debtorName}`,
    `🔑 شناسه بدهکار: ${debtorCode}`,
    "",
    "💰 لطفا مبلغ بدهی را وارد کنید:",
  ].join("\n");
}

export function formatDebtConfirmation(
  debtorName: string,
  debtorCode: string,
  amount: number,
  description: string | null,
  date: Date
): string {
  return [
    "لطفا اطلاعات بدهی زیر را تایید کنید:",
    "",
    `نام بدهکار: ${debtorName}`,
    `شناسه بدهکار: ${debtorCode}`,
    `مبلغ: ${formatToman(amount)}`,
    `توضیحات: ${description ?? PLACEHOLDER}`,
    `تاریخ شمسی: ${toSolarDate(date)}`,
    "",
    "آیا صحیح است؟ (بله/خیر)",
  ].join("\n");
}

function formatDebtDetails(d: Debt): string[] {
  return [
    `شناسه بدهکار: ${d.debtorCode}`,
    `نام بدهکار: ${d.debtorName}`,
    `مبلغ: ${formatToman(d.amount)}`,
    `تاریخ: ${toSolarDate(d.recordedAt)}`,
  ];
}

export function formatDebtReceipt(d: Debt): string {
  return [
    "✅ بدهی با موفقیت ثبت شد!",
    "",
    ...formatDebtDetails(d),
    `توضیحات: ${d.description ?? PLACEHOLDER}`,
  ].join("\n");
}

export function formatDebtDeleted(d: Debt): string {
  return ["✅ بدهی با موفقیت حذف شد!", "", ...formatDebtDetails(d)].join("\n");
}

export function formatDebtList(listing: DebtListing): string {
  const entries = listing.debts.map((d) =>
    [
      `نام بدهکار: ${d.debtorName}`,
      `شناسه بدهکار: ${d.debtorCode}`,
      `مبلغ: ${formatToman(d.amount)}`,
      `تاریخ: ${toSolarDate(d.recordedAt)}`,
      `توضیحات: ${d.description ?? PLACEHOLDER}`,
    ].join("\n")
  );

  return [
    "📋 لیست بدهی‌ها",
    "",
    `کل بدهی: ${formatToman(listing.total)}`,
    "",
    entries.join(`\n${SEPARATOR}\n`),
  ].join("\n");
}
