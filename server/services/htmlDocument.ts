import { APP_FOLDER_NAME } from '../config';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const HEADING_BLOCK = /^.{1,70}:\s*$/;

export interface HtmlDocumentInput {
  title: string;
  logoName: string;
  formattedText: string;
  language?: string;
  date?: Date;
}

const pad = (value: number) => String(value).padStart(2, '0');

export const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');

/** "05 Mar 2026 · 09:04:03", local time. */
export const formatDocumentDate = (date: Date): string =>
  `${pad(date.getDate())} ${MONTHS[date.getMonth()]} ${date.getFullYear()} · ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

export const renderBody = (formattedText: string): string => {
  const blocks = formattedText
    .trim()
    .split(/\n\s*\n/)
    .map(block => block.trim())
    .filter(Boolean);

  return blocks
    .map((block, index) => {
      if (HEADING_BLOCK.test(block)) {
        return `<h3>${escapeHtml(block.replace(/:\s*$/, ''))}</h3>`;
      }
      const lead = index === 0 ? ' class="lead"' : '';
      return `<p${lead}>${escapeHtml(block)}</p>`;
    })
    .join('\n');
};

export const buildHtmlDocument = ({ title, logoName, formattedText, language, date = new Date() }: HtmlDocumentInput): string => {
  const safeTitle = escapeHtml(title);
  const safeLogo = escapeHtml(logoName);

  return `<!doctype html>
<html lang="${escapeHtml(language || 'en')}">
<head>
<meta charset="utf-8"/>
<meta name="viewport" content="width=device-width,initial-scale=1"/>
<title>${safeLogo} · ${safeTitle}</title>
<style>
:root{ --ink:#111528; --muted:#51607f; --paper:#fff; --pri:#2b59ff; }
*{ box-sizing:border-box }
html,body{ height:100% }
body{
  margin:0; background:#f4f6fb; color:var(--ink);
  font-family:"Newsreader", Georgia, "Times New Roman", serif;
}
.wrapper{ max-width:900px; margin:28px auto; padding:0 18px; }
.header{ display:flex; align-items:center; gap:10px; margin-bottom:14px; }
.logo{ width:18px; height:18px; border-radius:6px; background:linear-gradient(135deg,#6ea8ff,#b16eff); }
.brand{ font:600 14px/1.2 system-ui, -apple-system, Segoe UI, Roboto, Arial; color:#33415c; letter-spacing:.2px }
.paper{
  background:var(--paper);
  border-radius:14px;
  border:1px solid #e5e9f5;
  box-shadow:0 14px 45px rgba(22,30,51,.06);
  padding:34px 40px;
}
h1{ margin:0 0 .6rem 0; font-weight:700; font-size:22px; letter-spacing:.2px }
.meta{ margin:0 0 1.2rem 0; color:#6b7aa6; font:500 13px/1.5 system-ui, -apple-system, Segoe UI, Roboto, Arial; }
.doc{ font-size:20px; line-height:1.9; letter-spacing:.15px; color:#1b243a; }
.doc p{ margin:0 0 1.05em 0; text-indent:1.25em; }
.doc p.lead{ text-indent:0; font-size:1.06em; }
.doc p.lead::first-letter{ float:left; font-size:3.1em; line-height:.86; padding-right:.08em; font-weight:600; color:var(--pri); }
.doc h3{
  font-size:.95em; font-weight:700; letter-spacing:.3px; margin:1.2em 0 .4em;
  text-transform:uppercase; color:#394a76; border-left:3px solid var(--pri); padding-left:.5em;
}
@media print {
  body{ background:#fff }
  .paper{ box-shadow:none; border:none; padding:0 }
  .header, .brand, .logo{ display:none }
}
</style>
</head>
<body>
  <div class="wrapper">
    <div class="header"><div class="logo"></div><div class="brand">${safeLogo} · ${APP_FOLDER_NAME}</div></div>
    <div class="paper">
      <h1>${safeTitle}</h1>
      <p class="meta">${formatDocumentDate(date)}</p>
      <div class="doc">
        ${renderBody(formattedText)}
      </div>
    </div>
  </div>
</body>
</html>`;
};
