import { IIngestionReport, ILogger } from '../../types';
import { PipelineComponent, PipelineError, PipelineErrorKind, describeError } from '../errors';

export enum QueryState {
	Received = 'Received',
	Embedding = 'Embedding',
	Retrieving = 'Retrieving',
	Assembling = 'Assembling',
	Generating = 'Generating',
	Completed = 'Completed',
	Errored = 'Errored',
}

const TRANSITIONS: Record<QueryState, readonly QueryState[]> = {
	[QueryState.Received]: [QueryState.Embedding, QueryState.Errored],
	[QueryState.Embedding]: [QueryState.Retrieving, QueryState.Errored],
	[QueryState.Retrieving]: [QueryState.Assembling, QueryState.Errored],
	[QueryState.Assembling]: [QueryState.Generating, QueryState.Errored],
	[QueryState.Generating]: [QueryState.Completed, QueryState.Errored],
	[QueryState.Completed]: [],
	[QueryState.Errored]: [],
};

/** Component responsible for the work done while in each state */
const COMPONENT_OF: Record<QueryState, PipelineComponent> = {
	[QueryState.Received]: 'pipeline',
	[QueryState.Embedding]: 'embedding',
	[QueryState.Retrieving]: 'retriever',
	[QueryState.Assembling]: 'assembler',
	[QueryState.Generating]: 'generation',
	[QueryState.Completed]: 'pipeline',
	[QueryState.Errored]: 'pipeline',
};

export interface IQueryTransition {
	queryId: string;
	from: QueryState;
	to: QueryState;
	at: Date;
	/** Set on the transition into Errored */
	error?: QueryFailedError;
}

export type QueryTransitionListener = (transition: IQueryTransition) => void;

/**
 * Terminal failure of a query, tagged with the state it failed in
 */
export class QueryFailedError extends PipelineError {
	constructor(
		public readonly queryId: string,
		public readonly state: QueryState,
		component: PipelineComponent,
		kind: PipelineErrorKind,
		originalError: unknown
	) {
		super(kind, component, `Query failed while ${state.toLowerCase()}: ${describeError(originalError)}`, originalError);
		this.name = 'QueryFailedError';
	}
}

/**
 * Persistent embedding failure that stopped an ingestion run. Documents
 * committed before the failure stay indexed and are listed in `report`.
 */
export class IngestionAbortedError extends PipelineError {
	constructor(
		public readonly report: IIngestionReport,
		originalError: unknown
	) {
		super(PipelineErrorKind.INGESTION_ABORTED, 'pipeline', `Ingestion aborted after ${report.ingested.length} documents: ${describeError(originalError)}`, originalError);
		this.name = 'IngestionAbortedError';
	}
}

/**
 * State machine of one query. Invalid transitions throw; a listener that
 * throws is logged and does not affect the query.
 */
export class QueryLifecycle {
	private current: QueryState = QueryState.Received;
	private readonly history: QueryState[] = [QueryState.Received];

	constructor(
		public readonly queryId: string,
		private readonly listeners: readonly QueryTransitionListener[],
		private readonly logger: ILogger
	) {}

	public get state(): QueryState {
		return this.current;
	}

	public get states(): readonly QueryState[] {
		return this.history;
	}

	public isTerminal = (): boolean => TRANSITIONS[this.current].length === 0;

	public transition = (to: QueryState, error?: QueryFailedError): void => {
		const from = this.current;
		if (!TRANSITIONS[from].includes(to)) {
			throw new RangeError(`Invalid query transition ${from} -> ${to}`);
		}
		this.current = to;
		this.history.push(to);

		const event: IQueryTransition = { queryId: this.queryId, from, to, at: new Date(), error };
		for (const listener of this.listeners) {
			try {
				listener(event);
			} catch (listenerError) {
				this.logger.error(`[PIPELINE] Transition listener failed on ${from} -> ${to} for ${this.queryId}: ${describeError(listenerError)}`);
			}
		}
	};

	/**
	 * Moves to Errored, wrapping `error` with the state it happened in
	 */
	public fail = (error: unknown): QueryFailedError => {
		const state = this.current;
		const failure =
			error instanceof PipelineError
				? new QueryFailedError(this.queryId, state, error.component, error.kind, error)
				: new QueryFailedError(this.queryId, state, COMPONENT_OF[state], PipelineErrorKind.UNKNOWN, error);
		this.transition(QueryState.Errored, failure);
		return failure;
	};
}
