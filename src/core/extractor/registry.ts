// src/core/extractor/registry.ts

import type { IExtractorLease, IExtractorSource, ILogger, IVisionModel, ModelLoader } from '../../@types/index.js';
import { config } from '../../config/index.js';
import { ModelUnavailableError } from '../../errors/index.js';
import { getLogger } from '../../utils/logging/logUtils.js';
import { FeatureExtractorAdapter } from './FeatureExtractorAdapter.js';
import { loadLayersModelFromDirectory } from './strategies/LayersModelBackend.js';
import { SeededConvNetModel } from './strategies/SeededConvNetModel.js';

/**
 * Lazily loaded, reference-counted holder of one shared feature extractor.
 *
 * The model is loaded on the first `acquire()`; concurrent first acquires
 * wait on the same load. A failed load is reported as `ModelUnavailableError`
 * and forgotten, so the next `acquire()` tries again. After `shutdown()` the
 * model is disposed as soon as the last outstanding lease is released.
 */
export class FeatureExtractorRegistry {
    private adapter: FeatureExtractorAdapter | null = null;
    private loading: Promise<FeatureExtractorAdapter> | null = null;
    private leases = 0;
    private closed = false;

    constructor(
        private readonly loader: ModelLoader,
        private readonly logger: ILogger = getLogger('extractor'),
    ) {}

    get isLoaded(): boolean {
        return this.adapter !== null;
    }

    get activeLeases(): number {
        return this.leases;
    }

    async acquire(): Promise<IExtractorLease> {
        if (this.closed) {
            throw new ModelUnavailableError('Feature extractor registry has been shut down.');
        }
        const adapter = await this.load();
        this.leases++;

        let released = false;
        return {
            adapter,
            release: () => {
                if (released) return;
                released = true;
                this.leases--;
                if (this.closed && this.leases === 0) this.disposeAdapter();
            },
        };
    }

    shutdown(): void {
        this.closed = true;
        if (this.leases === 0) this.disposeAdapter();
    }

    private load(): Promise<FeatureExtractorAdapter> {
        if (this.adapter) return Promise.resolve(this.adapter);
        this.loading ??= this.loader().then(
            (model: IVisionModel) => {
                const adapter = new FeatureExtractorAdapter(model);
                this.adapter = adapter;
                this.loading = null;
                this.logger.debug(`Loaded feature extractor "${model.name}".`);
                return adapter;
            },
            (error: unknown) => {
                this.loading = null;
                const reason = error instanceof Error ? error.message : String(error);
                this.logger.error(`Feature extractor failed to load: ${reason}`);
                throw new ModelUnavailableError(`Feature extractor failed to load: ${reason}`, { cause: error });
            },
        );
        return this.loading;
    }

    private disposeAdapter(): void {
        if (!this.adapter) return;
        this.adapter.dispose();
        this.adapter = null;
        this.logger.debug('Disposed feature extractor.');
    }
}

/**
 * Loader for the configured model: the pretrained layers model in
 * `PNGPROTECT_MODEL_DIR` when set, the seeded network otherwise.
 */
export function defaultModelLoader(modelDirectory: string | null = config.extractor.modelDirectory): ModelLoader {
    if (modelDirectory) {
        return () => loadLayersModelFromDirectory(modelDirectory);
    }
    return async () => new SeededConvNetModel();
}

let defaultRegistry: FeatureExtractorRegistry | null = null;

/**
 * Process-wide registry used when an operation is given neither an extractor nor a registry.
 */
export function getDefaultRegistry(): FeatureExtractorRegistry {
    defaultRegistry ??= new FeatureExtractorRegistry(defaultModelLoader());
    return defaultRegistry;
}

/**
 * Shuts the process-wide registry down; a later call to `getDefaultRegistry` starts a fresh one.
 */
export function shutdownDefaultRegistry(): void {
    defaultRegistry?.shutdown();
    defaultRegistry = null;
}

/**
 * Runs `task` with the extractor named by `source`, leasing it from a registry
 * for the duration of the call when the caller did not pass one in.
 */
export async function withExtractor<T>(
    source: IExtractorSource,
    task: (adapter: FeatureExtractorAdapter) => Promise<T>,
): Promise<T> {
    if (source.extractor) return task(source.extractor);
    const lease = await (source.registry ?? getDefaultRegistry()).acquire();
    try {
        return await task(lease.adapter);
    } finally {
        lease.release();
    }
}
