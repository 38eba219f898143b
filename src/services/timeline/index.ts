export { buildTimeline, dualTimeline, rankTopics, summarizeTopic } from './timeline';
export { renderPerspectives, renderTimelineMarkdown, toTimelineJs } from './render';
export type { DualTimeline, TimelineItem, TimelineJsDocument, TimelineJsSlide } from './types';
