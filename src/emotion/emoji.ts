import { EMOTION_KEYS, EmotionName, EmotionVector, clampEmotionVector, findDominantEmotion } from '../patterns/emotion';

// Ordered weakest to strongest.
export const EMOTION_EMOJI: Record<EmotionName, readonly string[]> = {
    joy: ['😊', '😄', '😃', '😁', '🥰', '😍'],
    fun: ['🎉', '🎊', '✨', '🌟', '🎈', '🎯'],
    anger: ['😠', '😡', '💢', '😤', '🔥', '⚡'],
    sad: ['😢', '😭', '💔', '😞', '😔', '🥺']
};

const EXTRA_THRESHOLD = 3;
const MAX_EXTRAS = 2;

function emojiFor(name: EmotionName, value: number): string {
    const set = EMOTION_EMOJI[name];
    const index = Math.max(0, Math.min(Math.ceil(value) - 1, set.length - 1));
    return set[index];
}

/**
 * Emoji for the dominant emotion, followed by up to two for other strong
 * channels. Empty when every channel is zero.
 */
export function selectEmoji(vector: Partial<EmotionVector>): string {
    const levels = clampEmotionVector(vector);
    const dominant = findDominantEmotion(levels);
    if (dominant.value === 0) return '';

    const extras = EMOTION_KEYS
        .filter(name => name !== dominant.name && levels[name] >= EXTRA_THRESHOLD)
        .slice(0, MAX_EXTRAS)
        .map(name => emojiFor(name, levels[name]));

    return [emojiFor(dominant.name, dominant.value), ...extras].join('');
}
