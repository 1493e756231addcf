export type EmotionName = 'joy' | 'fun' | 'anger' | 'sad';

export type EmotionVector = Record<EmotionName, number>;

/**
 * Fixed channel order. Dominant-emotion ties resolve to the earliest key here.
 */
export const EMOTION_KEYS: readonly EmotionName[] = ['joy', 'fun', 'anger', 'sad'];

export const EMOTION_MAX = 5;

export const NEUTRAL_EMOTION: EmotionVector = Object.freeze({ joy: 0, fun: 0, anger: 0, sad: 0 });

export function isEmotionName(value: string): value is EmotionName {
    return (EMOTION_KEYS as readonly string[]).includes(value);
}

function clampLevel(value: number | undefined): number {
    if (value === undefined || !Number.isFinite(value)) return 0;
    return Math.max(0, Math.min(EMOTION_MAX, value));
}

export function clampEmotionVector(vector: Partial<EmotionVector>): EmotionVector {
    return {
        joy: clampLevel(vector.joy),
        fun: clampLevel(vector.fun),
        anger: clampLevel(vector.anger),
        sad: clampLevel(vector.sad)
    };
}

/**
 * Brings a vector onto the canonical 0-5 scale. `unit` inputs (0.0-1.0)
 * are multiplied by 5 before clamping.
 */
export function normalizeEmotionVector(vector: Partial<EmotionVector>, scale: 'five' | 'unit' = 'five'): EmotionVector {
    if (scale === 'five') return clampEmotionVector(vector);
    const factor = EMOTION_MAX;
    return clampEmotionVector({
        joy: vector.joy === undefined ? undefined : vector.joy * factor,
        fun: vector.fun === undefined ? undefined : vector.fun * factor,
        anger: vector.anger === undefined ? undefined : vector.anger * factor,
        sad: vector.sad === undefined ? undefined : vector.sad * factor
    });
}

export interface DominantEmotion {
    name: EmotionName;
    value: number;
}

export function findDominantEmotion(vector: EmotionVector): DominantEmotion {
    let dominant: DominantEmotion = { name: EMOTION_KEYS[0], value: vector[EMOTION_KEYS[0]] };
    for (const name of EMOTION_KEYS) {
        // strict > keeps the first maximum
        if (vector[name] > dominant.value) {
            dominant = { name, value: vector[name] };
        }
    }
    return dominant;
}

/**
 * Maps the 1-5 level onto 0.2-1.0 as `v / 5`, so level 1 is exactly 0.2 and
 * level 5 exactly 1.0. Any nonzero level gets at least 0.2.
 *
 * This departs from the earlier `0.2 + v / 5 * 0.8` (0.36 at level 1, 0.68
 * at level 3), which misses 0.2 at level 1.
 */
export function emotionMultiplier(value: number): number {
    if (!Number.isFinite(value) || value <= 0) return 0;
    return Math.max(0.2, Math.min(1, value / EMOTION_MAX));
}

/** Non-dominant channels at or above the threshold, in key order. */
export function findMixedEmotions(vector: EmotionVector, dominant: EmotionName, threshold: number): EmotionName[] {
    return EMOTION_KEYS.filter(name => name !== dominant && vector[name] >= threshold);
}
