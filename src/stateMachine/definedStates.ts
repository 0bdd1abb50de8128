// src/stateMachine/definedStates.ts

export enum ShieldStates {
    INIT = 'INIT',
    PREPARE_REFERENCE = 'PREPARE_REFERENCE',
    OPTIMIZE_PERTURBATION = 'OPTIMIZE_PERTURBATION',
    PROJECT_PERTURBATION = 'PROJECT_PERTURBATION',
    ENFORCE_BUDGET = 'ENFORCE_BUDGET',
    SCORE_RESULT = 'SCORE_RESULT',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}
