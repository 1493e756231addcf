import {
    EmotionName,
    EmotionVector,
    clampEmotionVector,
    findDominantEmotion
} from '../patterns/emotion';

export interface TouchResult {
    area: string;
    intensity: number;
    emotion: EmotionVector;
    dominant: EmotionName | null;
}

export const INITIAL_EMOTION: EmotionVector = Object.freeze({ joy: 2.5, fun: 2.5, anger: 0, sad: 0 });

const PLEASANT_MIN = 0.3;
const PLEASANT_MAX = 0.7;

/**
 * Keeps a running emotion vector that drifts with touch pressure: moderate
 * touches please, faint ones bore, hard ones hurt.
 */
export class TouchEmotionModel {
    private emotion: EmotionVector;

    constructor(initial: Partial<EmotionVector> = INITIAL_EMOTION) {
        this.emotion = clampEmotionVector(initial);
    }

    public getEmotion(): EmotionVector {
        return { ...this.emotion };
    }

    public reset(initial: Partial<EmotionVector> = INITIAL_EMOTION): void {
        this.emotion = clampEmotionVector(initial);
    }

    public applyTouch(intensity: number, area: string = ''): TouchResult {
        const i = Number.isFinite(intensity) ? Math.max(0, Math.min(1, intensity)) : 0;
        const next = { ...this.emotion };

        if (i >= PLEASANT_MIN && i <= PLEASANT_MAX) {
            const pleasure = 1 - Math.abs(i - 0.5) * 2;
            next.joy += 0.5 * pleasure;
            next.fun += 0.3 * pleasure;
            next.anger -= 0.2 * pleasure;
            next.sad -= 0.2 * pleasure;
        } else if (i < PLEASANT_MIN) {
            next.fun -= 0.1;
            next.sad += 0.1;
        } else {
            const pain = (i - PLEASANT_MAX) / (1 - PLEASANT_MAX);
            next.anger += 0.5 * pain;
            next.joy -= 0.3 * pain;
            next.fun -= 0.3 * pain;
            next.sad += 0.2 * pain;
        }

        this.emotion = clampEmotionVector(next);
        const dominant = findDominantEmotion(this.emotion);

        return {
            area,
            intensity: i,
            emotion: this.getEmotion(),
            dominant: dominant.value > 0 ? dominant.name : null
        };
    }
}
