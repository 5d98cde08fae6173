import { ValidationError } from '../errors/index.js';

export const TEMPLATE_IDS = ['classic', 'modern', 'minimal'] as const;

export type TemplateId = (typeof TEMPLATE_IDS)[number];

export interface TemplateLayout {
  id: TemplateId;
  /** Full-width coloured header band, a thin accent bar, or nothing */
  header: 'band' | 'bar' | 'none';
  titleSize: number;
  bodySize: number;
  /** Shade alternate table rows with the accent colour */
  stripedRows: boolean;
  margin: number;
}

const LAYOUTS: Record<TemplateId, TemplateLayout> = {
  classic: { id: 'classic', header: 'band', titleSize: 22, bodySize: 10, stripedRows: false, margin: 48 },
  modern: { id: 'modern', header: 'bar', titleSize: 26, bodySize: 10, stripedRows: true, margin: 40 },
  minimal: { id: 'minimal', header: 'none', titleSize: 18, bodySize: 9, stripedRows: false, margin: 56 },
};

export function isTemplateId(value: string): value is TemplateId {
  return TEMPLATE_IDS.some((id) => id === value);
}

/** Templates are a sealed allow-list; callers never supply template bodies. */
export function resolveTemplate(templateId: string): TemplateLayout {
  if (!isTemplateId(templateId)) {
    throw new ValidationError(`Unknown template "${templateId}"`, [
      `templateId: must be one of ${TEMPLATE_IDS.join(', ')}`,
    ]);
  }
  return LAYOUTS[templateId];
}
