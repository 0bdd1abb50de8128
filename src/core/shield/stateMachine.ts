// src/core/shield/stateMachine.ts

import type { IPerturbationSpec, IReferenceFeatures, IShieldResult } from '../../@types/index.js';
import { config } from '../../config/index.js';
import { CancelledError } from '../../errors/index.js';
import { AbstractStateMachine, type IStateMachineOptions } from '../../stateMachine/AbstractStateMachine.js';
import { ShieldStates } from '../../stateMachine/definedStates.js';
import type { FeatureExtractorAdapter } from '../extractor/FeatureExtractorAdapter.js';
import type { PixelBuffer } from '../pixelBuffer/PixelBuffer.js';
import { measureDistortion, optimizePerturbation, projectPerturbation, toModelRgb } from './perturbation.js';
import { robustnessScore } from './robustness.js';

export interface IShieldMachineOptions extends IStateMachineOptions {
    adapter: FeatureExtractorAdapter;
    image: PixelBuffer;
    spec: IPerturbationSpec;
    signal?: AbortSignal;
}

/**
 * Number of progress-bar ticks a protect run makes: one per state entered,
 * one per optimization step.
 */
export function shieldProgressTotal(spec: IPerturbationSpec): number {
    return Object.keys(ShieldStates).length - 1 + spec.steps;
}

export class ShieldStateMachine extends AbstractStateMachine<ShieldStates, IShieldMachineOptions> {
    private spec: IPerturbationSpec;
    private rgb: Float32Array = new Float32Array(0);
    private reference: IReferenceFeatures | null = null;
    private delta: Float32Array | null = null;
    private trace: number[] = [];
    private perturbed: PixelBuffer | null = null;
    private distortion = 0;
    private budgetRescaled = false;
    private robustness = 0;

    constructor(options: IShieldMachineOptions) {
        super(ShieldStates.INIT, options);
        this.spec = { ...options.spec };

        this.stateTransitions = [
            { state: ShieldStates.INIT, handler: this.init },
            { state: ShieldStates.PREPARE_REFERENCE, handler: this.prepareReference },
            { state: ShieldStates.OPTIMIZE_PERTURBATION, handler: this.optimizePerturbation },
            { state: ShieldStates.PROJECT_PERTURBATION, handler: this.projectPerturbation },
            { state: ShieldStates.ENFORCE_BUDGET, handler: this.enforceBudget },
            { state: ShieldStates.SCORE_RESULT, handler: this.scoreResult },
        ];
    }

    protected getCompletionState(): ShieldStates {
        return ShieldStates.COMPLETED;
    }

    protected getErrorState(): ShieldStates {
        return ShieldStates.ERROR;
    }

    /**
     * Result of a completed run.
     *
     * @throws Error if the machine has not completed.
     */
    getResult(): IShieldResult {
        if (this.state !== ShieldStates.COMPLETED || !this.perturbed) {
            throw new Error(`Shield result requested in state "${this.state}".`);
        }
        return {
            image: this.perturbed,
            robustnessScore: this.robustness,
            distortion: this.distortion,
            spec: { ...this.spec },
            budgetRescaled: this.budgetRescaled,
            objectiveTrace: [...this.trace],
        };
    }

    private init(): void {
        const { logger, image, adapter } = this.options;
        if (this.options.signal?.aborted) throw new CancelledError('protect');
        logger.debug(
            `Protecting ${image.width}x${image.height}x${image.channels} image with ${adapter.name}: ` +
                `epsilon ${this.spec.epsilon.toFixed(4)}, ${this.spec.steps} steps, ${this.spec.targetMode}.`,
        );
    }

    private prepareReference(): void {
        if (this.spec.steps === 0) return;
        const { image, adapter } = this.options;
        this.rgb = toModelRgb(image);
        this.reference = adapter.reference(this.rgb, image.height, image.width);
        this.options.logger.debug(`Clean image top class: ${this.reference.topClass}.`);
    }

    private async optimizePerturbation(): Promise<void> {
        if (!this.reference) return;
        const { image, adapter, signal, progressBar, logger } = this.options;
        const { delta, trace } = await optimizePerturbation(
            adapter,
            this.rgb,
            image.height,
            image.width,
            this.reference,
            this.spec,
            {
                signal,
                onStep: (step, objective) => {
                    progressBar?.increment({ state: `STEP ${step + 1}/${this.spec.steps}` });
                    if (logger.verbose) logger.debug(`Step ${step + 1}: objective ${objective.toFixed(5)}`);
                },
            },
        );
        this.delta = delta;
        this.trace = trace;
    }

    private projectPerturbation(): void {
        const { image } = this.options;
        this.perturbed = this.delta ? projectPerturbation(image, this.delta, this.spec.epsilon) : image.clone();
        this.distortion = measureDistortion(image, this.perturbed);
    }

    private enforceBudget(): void {
        const { maxDistortion } = config.shield;
        if (!this.delta || this.distortion <= maxDistortion) return;

        const { image, logger } = this.options;
        logger.warn(
            `Distortion ${this.distortion.toFixed(4)} exceeds the budget of ${maxDistortion}; rescaling epsilon to ${maxDistortion}.`,
        );
        this.spec = { ...this.spec, epsilon: maxDistortion };
        this.perturbed = projectPerturbation(image, this.delta, maxDistortion);
        this.distortion = measureDistortion(image, this.perturbed);
        this.budgetRescaled = true;
    }

    private scoreResult(): void {
        if (!this.perturbed) return;
        this.robustness = robustnessScore(this.options.adapter, this.perturbed);
        this.options.logger.debug(
            `Robustness ${this.robustness}, distortion ${this.distortion.toFixed(4)}${this.budgetRescaled ? ' (rescaled)' : ''}.`,
        );
    }
}
