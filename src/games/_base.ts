import i18next from "i18next";

/**
 * Static description of a game.
 *
 * @export
 * @interface IGameInformation
 */
export interface IGameInformation {
    name: string;
    uid: string;
    playercounts: number[];
    version: string;
    dateAdded: string;
    // i18next key
    description: string;
    categories: string[];
}

/**
 * valid: A simple boolean that tells you whether the action is legal right now.
 * message: A localized message that explains why (or what the action would do).
 *
 * @export
 * @interface IValidationResult
 */
export interface IValidationResult {
    valid: boolean;
    message: string;
}

/**
 * Structured description of what happened, appended as the game runs.
 */
export type MoveResult =
    | { type: "place"; player: number; power: number; where: string; hidden: boolean }
    | { type: "phase"; phase: string }
    | { type: "showdown"; where: string; revealed: number[] }
    | { type: "weapon"; player: number; slot: number }
    | { type: "pass"; player: number }
    | { type: "dogfight"; where: string; eliminated: number[]; hit: boolean; draws: [number[], number[]] }
    | { type: "priority"; holder: number }
    | { type: "eog"; reason: "line" | "count" }
    | { type: "winners"; players: number[] };

/** One recorded action: who acted and which catalog index they chose. */
export type HistoryEntry = [player: number, index: number];

export type Outcome = number | "draw";

export abstract class GameBase {
    public static readonly gameinfo: IGameInformation;

    public description(): string {
        const ctor = this.constructor as typeof GameBase;
        return i18next.t(ctor.gameinfo.description);
    }

    public static info(): string {
        return JSON.stringify(this.gameinfo);
    }

    public abstract get gameover(): boolean;
    public abstract get winner(): number[];
    public abstract numplayers: number;
    public abstract results: MoveResult[];
    public abstract history: HistoryEntry[];

    public abstract clone(): GameBase;
    public abstract fingerprint(): string;

    /**
     * The winning player, "draw", or undefined while the game is running.
     */
    public outcome(): Outcome | undefined {
        if (!this.gameover) {
            return undefined;
        }
        if (this.winner.length === 1) {
            return this.winner[0];
        }
        return "draw";
    }

    public status(): string {
        if (this.gameover) {
            const outcome = this.outcome();
            return `**GAME OVER**\n\nWinner: ${outcome === "draw" ? "draw" : String(outcome)}\n\n`;
        }
        return "";
    }

    /**
     * Every recorded action, one line each, in play order.
     */
    public moveHistory(describe: (index: number) => string): string[] {
        return this.history.map(([player, index], n) => `${n + 1}. P${player} ${describe(index)}`);
    }
}
