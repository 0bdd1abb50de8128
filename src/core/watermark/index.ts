// src/core/watermark/index.ts

export { embed } from './embed.js';
export { extract, scanWatermark, majorityVote } from './extract.js';
export { computeCapacity, maxOwnerIdBytes } from './capacity.js';
export { BIT_PLANS, SUPPORTED_STRENGTHS, getBitPlan, isWatermarkStrength } from './bitPlans.js';
export { WatermarkPayload, PAYLOAD_OVERHEAD_BYTES } from './payload.js';
