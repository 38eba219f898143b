import type { Stance } from '@services/knowledge/types';

export interface TimelineItem {
  /** The chosen clock's time, falling back to the observation time */
  time: string | null;
  kind: 'event' | 'statement';
  factId: string;
  sourceDocumentId: string;
  description?: string;
  location?: string | null;
  content?: string;
  speaker?: string;
  stance?: Stance | null;
}

export interface DualTimeline {
  validTime: TimelineItem[];
  observationTime: TimelineItem[];
}

export interface TimelineJsDate {
  year: string;
  month: string;
  day: string;
}

export interface TimelineJsSlide {
  start_date: TimelineJsDate;
  text: { headline: string; text: string };
}

export interface TimelineJsDocument {
  title: { text: { headline: string; text: string } };
  events: TimelineJsSlide[];
}
