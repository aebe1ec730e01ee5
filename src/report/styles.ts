/**
 * Inline styles for the report email.
 *
 * Mail clients drop <style> blocks, so every element carries its own
 * style attribute.
 */

export const HEADER_COLOR = '#1a4f7a';
export const ALT_ROW = '#f2f7fc';
export const PLAIN_ROW = '#ffffff';

export const STYLE = {
  body:
    'font-family:Arial,sans-serif; color:#222; max-width:1100px; margin:auto; padding:20px; font-size:14px;',
  table:
    'border-collapse:collapse; font-family:Arial,sans-serif; font-size:13px; width:100%; max-width:1100px; border:1px solid #ccc;',
  th: `padding:8px 10px; background:${HEADER_COLOR}; color:#fff; text-align:left; white-space:nowrap;`,
  td: 'padding:7px 10px; white-space:nowrap;',
  tdBold: 'padding:7px 10px; font-weight:bold; white-space:nowrap;',
  link: `color:${HEADER_COLOR}; font-weight:bold;`,
  nextDay: 'color:#c0392b; font-size:9px; margin-left:2px;',
  title: `color:${HEADER_COLOR}; margin-bottom:4px;`,
  blockTitle: `color:${HEADER_COLOR}; margin-top:36px;`,
  summaryTitle: `color:${HEADER_COLOR}; margin-top:0;`,
  destinationTitle: `color:${HEADER_COLOR}; margin-top:28px; border-bottom:2px solid ${HEADER_COLOR}; padding-bottom:4px;`,
  subtitle: 'font-size:14px; color:#666; font-weight:normal;',
  route: 'font-size:13px; color:#666; font-weight:normal;',
  meta: 'color:#555; margin-top:0;',
  metaBlock: 'color:#555;',
  empty: 'color:#888; font-style:italic; margin-top:4px;',
  noData: 'color:#888;',
  rule: 'border:none; border-top:1px solid #ddd; margin:32px 0;',
  footer: 'font-size:11px; color:#aaa; margin-top:32px;',
} as const;
