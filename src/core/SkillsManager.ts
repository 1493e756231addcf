import { logger } from '../utils/logger';
import { errorMessage } from '../utils/ErrorHandler';
import type { ConfigManager } from '../config/ConfigManager';
import type { HapticDeviceController } from '../devices/HapticDeviceController';
import type { TouchEmotionModel } from '../emotion/TouchEmotionModel';
import type { PatternGenerator } from '../patterns/PatternGenerator';

/**
 * Everything a skill may touch. Passed explicitly to every handler; there is
 * no process-wide controller.
 */
export interface HapticContext {
    config: ConfigManager;
    /** Reflects the current config on every read. */
    readonly generator: PatternGenerator;
    touchModel: TouchEmotionModel;
    /** Current device, replaced by `initialize_device`. */
    controller: HapticDeviceController | null;
    createController: (host: string, port: number) => HapticDeviceController;
}

export interface Skill {
    name: string;
    description: string;
    usage: string;
    handler: (args: unknown, context: HapticContext) => Promise<unknown>;
}

export class SkillsManager {
    private skills: Map<string, Skill> = new Map();

    constructor(private context: HapticContext) {}

    public setContext(context: HapticContext) {
        this.context = context;
    }

    public getContext(): HapticContext {
        return this.context;
    }

    public registerSkill(skill: Skill) {
        this.skills.set(skill.name, skill);
        logger.info(`Skill registered: ${skill.name}`);
    }

    public registerSkills(skills: Skill[]) {
        for (const skill of skills) this.registerSkill(skill);
    }

    public getSkill(name: string): Skill | undefined {
        return this.skills.get(name);
    }

    public getAllSkills(): Skill[] {
        return Array.from(this.skills.values());
    }

    /**
     * Runs a skill by name. Unknown skills and handler failures come back
     * as an `Error: ...` string so the agent can read them.
     */
    public async executeSkill(name: string, args: unknown): Promise<unknown> {
        const skill = this.skills.get(name);
        if (!skill) {
            logger.warn(`SkillsManager: Skill ${name} not found`);
            return `Error: Skill ${name} not found`;
        }
        try {
            logger.info(`Executing skill: ${name}`);
            return await skill.handler(args, this.context);
        } catch (error) {
            logger.error(`Error executing skill ${name}: ${errorMessage(error)}`);
            return `Error executing skill ${name}: ${errorMessage(error)}`;
        }
    }

    public getSkillsPrompt(): string {
        const skillsList = this.getAllSkills().map(s => `- ${s.name}: ${s.description} (Usage: ${s.usage})`).join('\n');
        return `Available Skills:\n${skillsList}`;
    }
}
