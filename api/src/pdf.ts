import PDFDocument from "pdfkit";
import { format } from "date-fns";
import { fromDateKey } from "./dates.js";
import type { AssignmentRow } from "./scheduler.js";

// Tailwind-ish colors
const PURPLE_50 = "#FAF5FF";
const BLACK     = "#000000";

type Theme = {
  primary: string;      // table outline
  headerBg: string;     // day header bg (except first "Task")
  headerFg: string;
  taskNameBg: string;   // left column bg (body)
  emptyBg: string;      // empty cell bg
  emptyFg: string;
};

const THEME: Theme = {
  primary: "#333333",
  headerBg: PURPLE_50,
  headerFg: BLACK,
  taskNameBg: PURPLE_50,
  emptyBg: PURPLE_50,
  emptyFg: "#6B7280", // gray-500-ish
};

// draw text inside a box (wrap allowed) and vertically center it
function drawTextInBox(
  doc: PDFKit.PDFDocument,
  text: string,
  x: number,
  y: number,
  w: number,
  h: number,
  fontSize: number,
  color: string,
  align: "left" | "center" = "left",
  padY = 3 // small top padding so text never touches the border
) {
  doc.fontSize(fontSize).fillColor(color);
  const textHeight = doc.heightOfString(text, { width: w, align });
  const centered = y + Math.max(padY, (h - textHeight) / 2);
  doc.text(text, x, centered, { width: w, height: h, align });
}

// every draw sets its own size, so measuring can leave the font size changed
function measureH(doc: PDFKit.PDFDocument, text: string, w: number, fs: number) {
  doc.fontSize(fs);
  return doc.heightOfString(text, { width: w });
}

// shrink font-size down to minFs so text fits targetWidth
function fitTextToWidth(doc: PDFKit.PDFDocument, text: string, targetWidth: number, startFs: number, minFs: number) {
  let fs = startFs;
  while (fs > minFs) {
    doc.fontSize(fs);
    if (doc.widthOfString(text) <= targetWidth) break;
    fs -= 0.5;
  }
  return fs;
}

const clamp = (v: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, v));

export type Roster = {
  dates: string[];       // yyyy-MM-dd, one column each
  rows: AssignmentRow[];
};

/** Printable grid: one row per scheduled chore, one column per day, assignee in each cell. */
export function renderRosterPdf(out: NodeJS.WritableStream, roster: Roster) {
  const { dates, rows } = roster;

  // one table row per distinct (time, label, action), in time order
  const lineKey = (r: AssignmentRow) => `${r.time}\u0000${r.label}\u0000${r.action}`;
  const lines = new Map<string, { time: string; label: string }>();
  for (const r of [...rows].sort((a, b) => a.time.localeCompare(b.time))) {
    if (!lines.has(lineKey(r))) lines.set(lineKey(r), { time: r.time, label: r.label });
  }
  const cellFor = (key: string, date: string) => rows.find((r) => r.date === date && lineKey(r) === key) ?? null;

  const doc = new PDFDocument({
    size: "A4",
    layout: "landscape",
    margins: { top: 22, right: 22, bottom: 24, left: 22 },
  });
  doc.pipe(out);

  // Metrics
  const left    = doc.page.margins.left;
  const top     = doc.page.margins.top;
  const usableW = doc.page.width - doc.page.margins.left - doc.page.margins.right;

  const DAYS          = Math.max(1, dates.length);
  const HEADER_H      = 28;
  const BASE_ROW_H    = 28;
  const TASKCOL_MIN   = 95;
  const CELL_MIN_W    = 34;
  const CELL_PAD      = 12;
  const BASE_CELL_FS  = 9;
  const MIN_CELL_FS   = 6;
  const TITLE_FS      = 14;
  const HEADER_FS     = 8;

  let longestName = "";
  for (const r of rows) if (r.person.length > longestName.length) longestName = r.person;

  // Auto-fit: reduce task column then font
  let taskColW = 150;
  let cellW    = (usableW - taskColW) / DAYS;
  let cellFs   = BASE_CELL_FS;

  const fitsLongest = () => {
    doc.fontSize(cellFs);
    return doc.widthOfString(longestName) <= cellW - CELL_PAD;
  };

  while (!fitsLongest() && taskColW > TASKCOL_MIN) {
    const nextTaskW = Math.max(TASKCOL_MIN, taskColW - 5);
    const nextCellW = (usableW - nextTaskW) / DAYS;
    if (nextCellW < CELL_MIN_W) break;
    taskColW = nextTaskW;
    cellW    = nextCellW;
  }
  while (!fitsLongest() && cellFs > MIN_CELL_FS) cellFs -= 0.5;

  // Title
  const span = dates.length
    ? `${format(fromDateKey(dates[0]), "dd.MM.yyyy")} – ${format(fromDateKey(dates[dates.length - 1]), "dd.MM.yyyy")}`
    : "";
  doc.fontSize(TITLE_FS).fillColor(BLACK).text(`HOUSEHOLD ROTA ${span}`, left, top);
  let y = top + 18;

  // Header: left "Task" white; day headers purple
  doc.rect(left, y, taskColW, HEADER_H).strokeColor(THEME.primary).lineWidth(0.6).stroke();
  drawTextInBox(doc, "Task", left + 7, y, taskColW - 14, HEADER_H, HEADER_FS, THEME.headerFg, "left");

  doc.save();
  doc.rect(left + taskColW, y, cellW * DAYS, HEADER_H).fill(THEME.headerBg);
  doc.restore();

  dates.forEach((date, d) => {
    const x = left + taskColW + cellW * d;
    drawTextInBox(doc, format(fromDateKey(date), "EEE dd.MM"), x + 3, y, cellW - 6, HEADER_H, HEADER_FS, THEME.headerFg, "center");
    doc.rect(x, y, cellW, HEADER_H).strokeColor(THEME.primary).lineWidth(0.6).stroke();
  });
  y += HEADER_H;

  for (const [key, line] of lines) {
    const title = `${line.time} ${line.label}`;
    const titleW = taskColW - 12;
    const rowH = Math.max(BASE_ROW_H, Math.ceil(measureH(doc, title, titleW, cellFs)) + 8);

    if (y + rowH > doc.page.height - doc.page.margins.bottom) {
      doc.addPage();
      y = doc.page.margins.top;
    }

    doc.rect(left, y, taskColW, rowH).fillAndStroke(THEME.taskNameBg, THEME.primary);
    drawTextInBox(doc, title, left + 6, y, titleW, rowH, cellFs, BLACK, "left");

    dates.forEach((date, d) => {
      const x = left + taskColW + cellW * d;
      const label = cellFor(key, date)?.person ?? "";

      if (!label) { doc.save(); doc.rect(x, y, cellW, rowH).fill(THEME.emptyBg); doc.restore(); }
      doc.rect(x, y, cellW, rowH).strokeColor(THEME.primary).lineWidth(0.4).stroke();

      const fs = clamp(fitTextToWidth(doc, label, cellW - CELL_PAD, cellFs, MIN_CELL_FS), MIN_CELL_FS, cellFs);
      drawTextInBox(doc, label, x + 6, y, cellW - 12, rowH, fs, label ? BLACK : THEME.emptyFg, "center");
    });

    y += rowH;
  }

  doc.end();
}
