/**
 * Wires the runtime services for one CLI invocation: in-memory stores
 * restored from the workspace snapshot, the vendor registry, the oracle
 * client, the batch pipeline and the job orchestrator.
 */

import type { ClassificationResult, EngineConfig } from '@txnflow/shared';
import { OracleError } from '@txnflow/shared';
import { InProcessTaskQueue } from '../jobs/task-queue.js';
import { JobOrchestrator } from '../jobs/orchestrator.js';
import type { QueuedBatch } from '../jobs/types.js';
import { OracleClient } from '../oracle/client.js';
import { OpenAiTransport } from '../oracle/openai-transport.js';
import type { OracleTransport } from '../oracle/types.js';
import { BatchPipeline } from '../pipeline/runner.js';
import type { Classifier } from '../pipeline/types.js';
import { InMemoryClassificationCache } from '../store/memory-cache.js';
import { InMemoryTransactionStore } from '../store/memory-transaction-store.js';
import { InMemoryVendorRepository } from '../store/memory-vendor-repository.js';
import { captureSnapshot, loadSnapshot, saveSnapshot } from '../store/snapshot.js';
import type { Workspace } from '../types.js';
import type { EnvConfig } from '../utils/env.js';
import { getLogger } from '../utils/logger.js';
import { VendorRegistry } from '../vendor/registry.js';
import { loadEngineConfig, loadVendorCatalog } from '../workspace/config.js';

const logger = getLogger('Runtime');

export interface RuntimeOptions {
    env: EnvConfig;
    /** Overrides the OpenAI transport */
    transport?: OracleTransport;
    now?: () => Date;
}

export interface Runtime {
    config: EngineConfig;
    store: InMemoryTransactionStore;
    cache: InMemoryClassificationCache;
    vendors: InMemoryVendorRepository;
    registry: VendorRegistry;
    pipeline: BatchPipeline;
    orchestrator: JobOrchestrator;
    /** False when no transport is configured; every oracle call then fails */
    oracleConfigured: boolean;
    /** Write stores and terminal jobs back to state/state.json */
    save(): Promise<void>;
    close(): Promise<void>;
}

export async function createRuntime(workspace: Workspace, options: RuntimeOptions): Promise<Runtime> {
    const now = options.now ?? (() => new Date());
    const config = loadEngineConfig(workspace);
    const snapshot = loadSnapshot(workspace.statePath);

    const store = new InMemoryTransactionStore(snapshot?.records);
    const cache = new InMemoryClassificationCache(snapshot?.cache);
    const vendors = new InMemoryVendorRepository(snapshot?.vendors);

    const registry = new VendorRegistry(vendors, {
        acceptThreshold: config.vendor.acceptThreshold,
        reviewThreshold: config.vendor.reviewThreshold,
        now,
    });
    const seeded = await registry.seed(loadVendorCatalog(workspace));
    if (seeded > 0) {
        logger.info({ seeded }, 'Seeded vendors from catalogue');
    }

    const transport = options.transport ?? openAiTransport(config, options.env);
    const oracle: Classifier = transport
        ? new OracleClient(transport, {
              maxAttempts: config.oracle.maxAttempts,
              timeoutMs: config.oracle.timeoutMs,
              backoff: config.oracle.backoff,
              randomize: true,
          })
        : new UnconfiguredOracle();

    const pipeline = new BatchPipeline(
        { store, cache, registry, oracle, now },
        {
            maxConcurrency: config.pipeline.maxConcurrency,
            reviewConfidenceThreshold: config.pipeline.reviewConfidenceThreshold,
            oracleFailureLimit: config.pipeline.oracleFailureLimit,
            vendorCategories: config.vendor.vendorCategories,
            currencyMinorUnits: config.currencyMinorUnits,
        }
    );

    const queue = new InProcessTaskQueue<QueuedBatch>({ workerConcurrency: config.queue.workerConcurrency });
    const orchestrator = new JobOrchestrator(pipeline, queue, {
        batchDeadlineMs: config.pipeline.batchDeadlineMs,
        now,
    });
    if (snapshot) {
        orchestrator.restore(snapshot.jobs);
    }

    return {
        config,
        store,
        cache,
        vendors,
        registry,
        pipeline,
        orchestrator,
        oracleConfigured: transport !== undefined,
        async save() {
            const next = await captureSnapshot({ store, cache, vendors, jobs: () => orchestrator.records() }, now());
            saveSnapshot(workspace.statePath, next);
        },
        close: () => orchestrator.close(),
    };
}

function openAiTransport(config: EngineConfig, env: EnvConfig): OracleTransport | undefined {
    if (!env.OPENAI_API_KEY) {
        return undefined;
    }
    return OpenAiTransport.create({
        apiKey: env.OPENAI_API_KEY,
        baseURL: env.OPENAI_BASE_URL,
        model: config.oracle.model,
    });
}

class UnconfiguredOracle implements Classifier {
    async classify(): Promise<ClassificationResult> {
        throw new OracleError('fatal', 'OPENAI_API_KEY is not set', 0);
    }
}
