/**
 * MJML Email Renderer
 * Compiles the urgent alert template to HTML, with a plain text twin
 */

import mjml2html from 'mjml';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { Item, Rating } from '../db/models';
import { logError } from '../observability/logger';

export interface UrgentAlertData {
  alertId: string;
  accountId: string;
  score: string;
  category: string;
  createdAt: string;
  summary: string;
  text: string;
  reason: string;
  url: string;
}

const templateCache = new Map<string, string>();

/**
 * Load MJML template from the templates directory beside this module
 */
function loadTemplate(templateName: string): string {
  const cached = templateCache.get(templateName);
  if (cached) return cached;

  const templatePath = fileURLToPath(new URL(`./templates/${templateName}.mjml`, import.meta.url));

  try {
    const template = readFileSync(templatePath, 'utf-8');
    templateCache.set(templateName, template);
    return template;
  } catch (error) {
    logError('Failed to load email template', error, {
      templateName,
      templatePath,
    });
    throw error;
  }
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Replace {{key}} placeholders with escaped values
 */
export function renderTemplate(template: string, data: UrgentAlertData): string {
  return template.replace(/{{(\w+)}}/g, (placeholder, key: string) => {
    const entry = Object.entries(data).find(([name]) => name === key);
    return entry ? escapeHtml(entry[1]) : placeholder;
  });
}

export function toUrgentAlertData(item: Item, rating: Rating, alertId: string): UrgentAlertData {
  return {
    alertId,
    accountId: item.accountId,
    score: String(rating.score),
    category: rating.category,
    createdAt: item.createdAt.toISOString(),
    summary: rating.summary,
    text: item.text,
    reason: rating.reason,
    url: item.url,
  };
}

/**
 * Plain text version of the alert
 */
export function renderUrgentAlertText(data: UrgentAlertData): string {
  return [
    `URGENT ${data.score}/10 from @${data.accountId} (${data.category})`,
    '',
    data.summary,
    '',
    data.text,
    '',
    `Why: ${data.reason}`,
    `Link: ${data.url}`,
    '',
    'Reply with 1 (INTERESTING), 2 (NOTHING) or 3 (BUILD).',
    `Alert id: ${data.alertId}`,
  ].join('\n');
}

export function renderUrgentAlert(
  item: Item,
  rating: Rating,
  alertId: string
): { subject: string; html: string; text: string } {
  const data = toUrgentAlertData(item, rating, alertId);
  const result = mjml2html(renderTemplate(loadTemplate('urgent-alert'), data), {
    validationLevel: 'soft',
  });

  if (result.errors.length > 0) {
    logError('MJML compilation errors', undefined, {
      errors: result.errors.map((e) => e.formattedMessage),
    });
  }

  return {
    subject: `[${data.score}/10] @${data.accountId}: ${data.summary.slice(0, 60)}`,
    html: result.html,
    text: renderUrgentAlertText(data),
  };
}
