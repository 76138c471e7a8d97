import type { AlertRecord, AlertValue, NotificationTemplates } from '../repositories/types';

export type ResolvedTemplates = Required<{ [K in keyof NotificationTemplates]: string }>;

export const DEFAULT_TEMPLATES: ResolvedTemplates = {
  telegramText: '🚨 [${level}] ${siloName}: ${message} (value=${value})\n${timestamp}',
  emailSubject: 'Alert on silo ${siloName} at ${timestamp}',
  emailBody: 'Silo: ${siloName}\nLevel: ${level}\nTime: ${timestamp}\n\n${message}\nValue: ${value}',
  smsBody: 'ALERT ${siloName} [${level}]: ${message} (value=${value})',
  pushText: '[${level}] ${siloName}: ${message}'
};

const TEMPLATE_KEYS: readonly (keyof ResolvedTemplates)[] = [
  'telegramText',
  'emailSubject',
  'emailBody',
  'smsBody',
  'pushText'
];

export type TemplateContext = Record<string, string>;

export function mergeTemplates(overrides: NotificationTemplates | null | undefined): ResolvedTemplates {
  const merged: ResolvedTemplates = { ...DEFAULT_TEMPLATES };
  if (!overrides) {
    return merged;
  }

  TEMPLATE_KEYS.forEach(key => {
    const value = overrides[key];
    if (typeof value === 'string' && value.length > 0) {
      merged[key] = value;
    }
  });
  return merged;
}

/** Replaces `${name}` placeholders; unknown names are left in place. */
export function renderTemplate(template: string, context: TemplateContext): string {
  return template.replace(/\$\{(\w+)\}/g, (placeholder, name: string) =>
    Object.prototype.hasOwnProperty.call(context, name) ? context[name] : placeholder
  );
}

export function formatAlertValue(value: AlertValue): string {
  if (value === null) {
    return 'n/a';
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return Object.entries(value)
    .map(([key, entry]) => `${key}=${entry === null ? 'n/a' : entry}`)
    .join(', ');
}

export function buildTemplateContext(alert: AlertRecord, siloName: string): TemplateContext {
  return {
    siloName,
    level: alert.level.toUpperCase(),
    message: alert.message,
    value: formatAlertValue(alert.value),
    timestamp: alert.timestamp.toISOString()
  };
}
