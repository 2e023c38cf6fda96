import { Server as SocketIOServer, Socket } from 'socket.io';
import { config } from '../config';
import { logger } from '../config/logger';
import type { AudioInput, CandidateChannel, OutboundEvent } from './interview/channel';
import { AsyncQueue } from './interview/channel';
import { InvalidPlanError } from './interview/errors';
import { parsePlanPayload } from './interview/PlanSource';
import type { InterviewSession } from './interview/InterviewSession';
import type { SessionRegistry } from './interview/SessionRegistry';

export interface StartPayload {
    sessionId?: string;
    candidateId: string;
    jobId: string;
    plan?: unknown;
    deadlineMs?: number;
}

/** Reads an `interview:start` payload; a requested length is capped at `maxDeadlineMs`. */
export function readStartPayload(data: unknown, maxDeadlineMs: number): StartPayload | null {
    if (typeof data !== 'object' || data === null) return null;
    const candidateId = 'candidateId' in data && typeof data.candidateId === 'string' ? data.candidateId.trim() : '';
    const jobId = 'jobId' in data && typeof data.jobId === 'string' ? data.jobId.trim() : '';
    if (!candidateId || !jobId) return null;
    const minutes =
        'deadlineMinutes' in data && typeof data.deadlineMinutes === 'number' && Number.isFinite(data.deadlineMinutes)
            ? data.deadlineMinutes
            : 0;
    return {
        candidateId,
        jobId,
        sessionId: 'sessionId' in data && typeof data.sessionId === 'string' ? data.sessionId : undefined,
        plan: 'plan' in data ? data.plan : undefined,
        deadlineMs: minutes > 0 ? Math.min(Math.round(minutes * 60 * 1000), maxDeadlineMs) : undefined,
    };
}

/** The parts of a socket.io socket the gateway talks to. */
export interface ClientSocket {
    readonly id: string;
    readonly connected: boolean;
    emit(event: string, payload: unknown): void;
}

function clientOf(socket: Socket): ClientSocket {
    return {
        id: socket.id,
        get connected() {
            return socket.connected;
        },
        emit: (event, payload) => {
            socket.emit(event, payload);
        },
    };
}

/** Accepts raw binary from socket.io clients, or base64 text from simpler ones. */
export function toAudioBuffer(data: unknown): Buffer | null {
    if (Buffer.isBuffer(data)) return data;
    if (data instanceof ArrayBuffer) return Buffer.from(data);
    if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    if (typeof data === 'string' && data.length > 0) return Buffer.from(data, 'base64');
    if (typeof data === 'object' && data !== null && 'audio' in data) return toAudioBuffer(data.audio);
    return null;
}

/**
 * CandidateChannel over one socket. Audio is only queued while a listening
 * window is open; anything the candidate sends in between is dropped.
 */
export class SocketCandidateChannel implements CandidateChannel {
    private queue: AsyncQueue<AudioInput> | null = null;

    constructor(
        private readonly socket: ClientSocket,
        private readonly sessionId: () => string
    ) {}

    listen(signal: AbortSignal): AsyncIterable<AudioInput> {
        this.queue?.close();
        const queue = new AsyncQueue<AudioInput>();
        this.queue = queue;
        if (signal.aborted) queue.close();
        else signal.addEventListener('abort', () => queue.close(), { once: true });
        return queue;
    }

    push(input: AudioInput): void {
        if (this.queue && !this.queue.isClosed()) this.queue.push(input);
    }

    close(): void {
        this.queue?.close();
        this.queue = null;
    }

    send(event: OutboundEvent): void {
        const sessionId = this.sessionId();
        switch (event.type) {
            case 'greeting':
                this.socket.emit('interview:greeting', { sessionId, text: event.text });
                break;
            case 'question':
                this.socket.emit('interview:question', {
                    sessionId,
                    itemId: event.itemId,
                    text: event.text,
                    targetMs: event.targetMs,
                    maxMs: event.maxMs,
                });
                break;
            case 'follow_up':
                this.socket.emit('interview:follow-up', { sessionId, itemId: event.itemId, text: event.text });
                break;
            case 'listening':
                this.socket.emit('interview:listening', { sessionId, itemId: event.itemId, cutoffMs: event.cutoffMs });
                break;
            case 'audio':
                this.socket.emit('audio:chunk', event.chunk);
                break;
            case 'closing':
                this.socket.emit('interview:closing', { sessionId, text: event.text });
                break;
            case 'ended':
                this.socket.emit('interview:ended', { sessionId, message: event.message });
                break;
        }
    }
}

type Connection =
    | { status: 'starting' }
    | { status: 'live'; session: InterviewSession; channel: SocketCandidateChannel };

/**
 * One interview per connected candidate. A connection is claimed before the
 * plan is fetched, so a second start or a disconnect during the fetch is seen.
 */
export class InterviewGateway {
    private connections: Map<string, Connection> = new Map();

    constructor(
        private readonly registry: SessionRegistry,
        private readonly maxDeadlineMs: number
    ) {}

    async start(client: ClientSocket, data: unknown): Promise<void> {
        if (this.connections.has(client.id)) {
            client.emit('interview:error', { error: 'An interview is already running on this connection' });
            return;
        }
        const payload = readStartPayload(data, this.maxDeadlineMs);
        if (!payload) {
            client.emit('interview:error', { error: 'candidateId and jobId are required' });
            return;
        }
        this.connections.set(client.id, { status: 'starting' });

        let sessionId = payload.sessionId ?? '';
        const channel = new SocketCandidateChannel(client, () => sessionId);
        let session: InterviewSession;
        try {
            session = await this.registry.launch(
                {
                    sessionId: payload.sessionId,
                    candidateId: payload.candidateId,
                    jobId: payload.jobId,
                    plan: payload.plan === undefined ? undefined : parsePlanPayload(payload.plan),
                    deadlineMs: payload.deadlineMs,
                },
                channel
            );
        } catch (error) {
            this.connections.delete(client.id);
            if (error instanceof InvalidPlanError) {
                logger.warn('Rejected interview plan', { socketId: client.id, issues: error.issues });
                client.emit('interview:error', { error: error.message, issues: error.issues });
                return;
            }
            throw error;
        }
        sessionId = session.id;

        if (!client.connected || this.connections.get(client.id)?.status !== 'starting') {
            logger.warn('Candidate left before the interview started', { socketId: client.id, sessionId });
            session.abort({ code: 'channel_closed', message: 'Candidate connection closed' });
            channel.close();
            return;
        }
        this.connections.set(client.id, { status: 'live', session, channel });

        client.emit('interview:started', { sessionId, remainingMs: session.snapshot().remainingMs });
        logger.info('Interview started', { socketId: client.id, sessionId, candidateId: payload.candidateId });

        const summary = await session.finished;
        channel.close();
        if (this.live(client.id)?.session === session) this.connections.delete(client.id);
        if (summary.finalPhase === 'completed') {
            client.emit('interview:completed', { sessionId: summary.sessionId, summary });
        }
    }

    audioChunk(client: ClientSocket, data: unknown): void {
        const connection = this.live(client.id);
        if (!connection) {
            logger.debug('Audio for socket without an interview', { socketId: client.id });
            return;
        }
        const chunk = toAudioBuffer(data);
        if (!chunk) {
            logger.warn('Unreadable audio chunk', { socketId: client.id, sessionId: connection.session.id });
            return;
        }
        connection.channel.push({ kind: 'chunk', data: chunk });
    }

    endOfTurn(client: ClientSocket): void {
        this.live(client.id)?.channel.push({ kind: 'end_of_turn' });
    }

    pause(client: ClientSocket): void {
        this.live(client.id)?.session.pause();
    }

    resume(client: ClientSocket): void {
        this.live(client.id)?.session.resume();
    }

    abort(client: ClientSocket): void {
        this.live(client.id)?.session.abort({ code: 'candidate_requested', message: 'Candidate ended the interview' });
    }

    /** A start still in flight finds its claim gone and aborts what it launched. */
    disconnect(client: ClientSocket): void {
        const connection = this.connections.get(client.id);
        if (!connection) return;
        this.connections.delete(client.id);
        if (connection.status === 'live') {
            connection.session.abort({ code: 'channel_closed', message: 'Candidate connection closed' });
            connection.channel.close();
        }
    }

    private live(clientId: string): Extract<Connection, { status: 'live' }> | undefined {
        const connection = this.connections.get(clientId);
        return connection?.status === 'live' ? connection : undefined;
    }
}

/** Socket.io wiring: inbound events go to the gateway, outbound ones through each session's channel. */
export class SignalingService {
    private readonly gateway: InterviewGateway;

    constructor(
        private readonly io: SocketIOServer,
        registry: SessionRegistry,
        maxDeadlineMs: number = config.interview.maxDeadlineMs
    ) {
        this.gateway = new InterviewGateway(registry, maxDeadlineMs);
        this.setupSocketHandlers();
    }

    private setupSocketHandlers(): void {
        this.io.on('connection', (socket: Socket) => {
            logger.info('Client connected', { socketId: socket.id });
            const client = clientOf(socket);

            socket.on('interview:start', (data: unknown) => {
                this.gateway.start(client, data).catch((error: unknown) => {
                    logger.error('Failed to start interview', { socketId: socket.id, error });
                    client.emit('interview:error', { error: 'Failed to start interview' });
                });
            });
            socket.on('audio:chunk', (data: unknown) => this.gateway.audioChunk(client, data));
            socket.on('audio:end-of-turn', () => this.gateway.endOfTurn(client));
            socket.on('interview:pause', () => this.gateway.pause(client));
            socket.on('interview:resume', () => this.gateway.resume(client));
            socket.on('interview:abort', () => this.gateway.abort(client));
            socket.on('disconnect', () => {
                logger.info('Client disconnected', { socketId: socket.id });
                this.gateway.disconnect(client);
            });
        });

        logger.info('Socket.io handlers initialized');
    }
}
