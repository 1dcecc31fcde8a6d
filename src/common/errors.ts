/**
 * Errors intended for the client instead of developers.
 * Because of how Chai works, the message needs to remain an error code,
 * but this error has a `client` field that contains the translated message.
 *
 * @export
 * @class UserFacingError
 * @extends {Error}
 */
export class UserFacingError extends Error {
    public client: string;
    constructor(message: string, translation: string) {
        super(message);
        this.name = "UserFacingError";
        this.client = translation;
    }
}

export type ProtocolErrorCode =
    | "WRONG_PHASE"
    | "WRONG_ACTOR"
    | "NO_ACTIVE_DOGFIGHT"
    | "DOGFIGHT_ACTIVE"
    | "DOGFIGHT_INCOMPLETE"
    | "DOGFIGHT_COMPLETE"
    | "NO_DOGFIGHTS_LEFT";

/**
 * A caller broke the engine's calling contract (wrong phase, wrong actor,
 * dogfight calls out of order). Never caught by the engine itself.
 */
export class ProtocolError extends Error {
    public readonly code: ProtocolErrorCode;
    constructor(code: ProtocolErrorCode, message: string) {
        super(message);
        this.name = "ProtocolError";
        this.code = code;
    }
}

/**
 * Raised inside a disposable simulation when a hypothetical world cannot be
 * played forward. Rollout trials catch it and score the trial as neutral.
 */
export class SimulationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "SimulationError";
    }
}

/**
 * A recorded game cannot be played back: bad input, an out-of-turn player,
 * an illegal action or an outcome that does not match.
 */
export class ReplayError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ReplayError";
    }
}
