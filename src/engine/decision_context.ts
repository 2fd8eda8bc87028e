import { ClassifierAdapter, DEFAULT_MODEL_PATH, ProbabilityModel, loadCreditModel } from './classifier_adapter';
import { DEFAULT_KNOWLEDGE_BASE_PATH, KnowledgeBase, loadKnowledgeBase } from './knowledge_base';
import { EngineConfig, createEngineConfig } from '../config/engine_config';

/**
 * Everything an evaluation may read. Built once at startup, then shared read-only.
 */
export interface DecisionContext {
    readonly config: Readonly<EngineConfig>;
    readonly classifier: ClassifierAdapter;
    readonly knowledgeBase: KnowledgeBase;
}

export interface DecisionContextOptions {
    config?: Partial<EngineConfig>;
    model?: ProbabilityModel;
    modelPath?: string;
    knowledgeBase?: KnowledgeBase;
    knowledgeBasePath?: string;
}

/**
 * Reads the model artifact and knowledge base and validates the tuning values.
 * Any problem surfaces here as a ConfigurationError, never during a request.
 */
export function createDecisionContext(options: DecisionContextOptions = {}): DecisionContext {
    const config = createEngineConfig(options.config);
    const model = options.model ?? loadCreditModel(options.modelPath ?? DEFAULT_MODEL_PATH);
    const knowledgeBase = options.knowledgeBase ?? loadKnowledgeBase(options.knowledgeBasePath ?? DEFAULT_KNOWLEDGE_BASE_PATH);

    return Object.freeze({
        config,
        classifier: new ClassifierAdapter(model),
        knowledgeBase
    });
}
