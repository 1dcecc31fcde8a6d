import { GameBase, IGameInformation, IValidationResult, MoveResult, HistoryEntry } from "./_base";
import { DeepReadonly, ProtocolError, SeededRandom, UserFacingError, randomSeed, scopedLogger, x2uid } from "../common";
import {
    DOGFIGHT_ORDER, GridfightSnapshot, IDogfightContext, IDogfightTurn, IGridfightState, Phase, Position, coords2algebraic, copyState,
    countControlled, describeState, dogfightContext, hasLine, initialState, isContested, isHiddenPower, opponent, playerid,
} from "./gridfight/board";
import { ActionCatalog, getActionCatalog } from "./gridfight/catalog";
import { IDogfightResult, openDogfight, advanceDogfight, resolveDogfight } from "./gridfight/dogfight";
import i18next from "i18next";
import rfdc from "rfdc";

const deepclone = rfdc();
const log = scopedLogger("engine");

export type { playerid, Phase, Position, GridfightSnapshot, IDogfightContext };
export type { IDogfightResult };

export class GridfightGame extends GameBase {
    public static readonly gameinfo: IGameInformation = {
        name: "Gridfight",
        uid: "gridfight",
        playercounts: [2],
        version: "20261018",
        dateAdded: "2026-10-18",
        // i18next.t("gridfight:description")
        description: "gridfight:description",
        categories: ["goal>align", "mechanic>place", "mechanic>random>play", "board>shape>rect", "components>simple>3c", "other>2+players"],
    };

    public numplayers = 2;
    public readonly catalog: ActionCatalog = getActionCatalog();
    public history: HistoryEntry[] = [];
    public results: MoveResult[] = [];
    private _state: IGridfightState;
    private rng: SeededRandom;

    /**
     * A new game from a seed, or an engine that takes ownership of an existing
     * state and draws from `rngSeed`.
     */
    constructor(state?: number | IGridfightState, rngSeed?: number) {
        super();
        if (typeof state === "object") {
            this._state = state;
            this.rng = new SeededRandom(rngSeed ?? randomSeed());
        } else {
            const s = state ?? randomSeed();
            this.rng = new SeededRandom(s);
            this._state = initialState(s, this.rng);
        }
    }

    /**
     * A disposable engine over a structural copy of a snapshot. The copy keeps
     * the snapshot's seed, but randomness comes from a fresh stream.
     */
    public static fromSnapshot(snapshot: GridfightSnapshot, rngSeed: number): GridfightGame {
        return new GridfightGame(copyState(snapshot), rngSeed);
    }

    public get seed(): number {
        return this._state.seed;
    }

    public get phase(): Phase {
        return this._state.phase;
    }

    public get currplayer(): playerid {
        return this._state.currplayer;
    }

    public get turn(): number {
        return this._state.turn;
    }

    public get priority(): playerid {
        return this._state.priority;
    }

    public get gameover(): boolean {
        return this._state.gameover;
    }

    public get winner(): playerid[] {
        return [...this._state.winner];
    }

    public isGameOver(): boolean {
        return this._state.gameover;
    }

    public getWinner(): playerid | "draw" | undefined {
        if (!this._state.gameover) {
            return undefined;
        }
        if (this._state.winner.length === 1) {
            return this._state.winner[0];
        }
        return "draw";
    }

    /**
     * A deep copy of the authoritative state. Nothing the caller does to it
     * reaches the engine.
     */
    public state(): GridfightSnapshot {
        return deepclone(this._state);
    }

    public getLegalMask(player?: playerid): boolean[] {
        return this.catalog.legalMask(this._state, player ?? this._state.currplayer);
    }

    public getLegalActions(player?: playerid): number[] {
        return this.catalog.legalIndices(this._state, player ?? this._state.currplayer);
    }

    private inRange(index: number): boolean {
        return Number.isInteger(index) && index >= 0 && index < this.catalog.size();
    }

    /**
     * Explains whether an action is legal for the player (by default the one to
     * move). The verdict always comes from the catalog mask.
     */
    public validateAction(index: number, player?: playerid): IValidationResult {
        const result: IValidationResult = {valid: false, message: i18next.t("gridfight:validation.GAMEOVER")};
        const who = player ?? this._state.currplayer;
        if (!this.inRange(index)) {
            result.message = i18next.t("gridfight:validation.OUT_OF_RANGE", {index, max: this.catalog.size() - 1});
            return result;
        }
        if (this._state.gameover) {
            return result;
        }
        const action = this.catalog.get(index);
        if (this.catalog.isLegal(this._state, who, index)) {
            result.valid = true;
            switch (action.type) {
                case "place":
                    result.message = i18next.t("gridfight:validation.VALID_PLACEMENT", {player: who, power: action.power, where: coords2algebraic(action.row, action.col)});
                    break;
                case "weapon":
                    result.message = i18next.t("gridfight:validation.VALID_WEAPON", {player: who, slot: action.slot});
                    break;
                case "pass":
                    result.message = i18next.t("gridfight:validation.VALID_PASS", {player: who});
                    break;
            }
            return result;
        }

        // work out why
        const resources = this._state.resources[who];
        if (this._state.phase === "placement") {
            if (action.type !== "place") {
                result.message = i18next.t("gridfight:validation.WRONG_PHASE", {action: action.type, phase: this._state.phase});
            } else if (!resources.unplaced.includes(action.power)) {
                result.message = i18next.t("gridfight:validation.NOT_IN_HAND", {player: who, power: action.power});
            } else {
                result.message = i18next.t("gridfight:validation.OWN_SQUARE", {player: who, where: coords2algebraic(action.row, action.col)});
            }
        } else if (action.type === "weapon") {
            result.message = i18next.t("gridfight:validation.NO_SUCH_WEAPON", {player: who, slot: action.slot});
        } else {
            result.message = i18next.t("gridfight:validation.WRONG_PHASE", {action: action.type, phase: this._state.phase});
        }
        return result;
    }

    /**
     * Applies a placement for the player to move. Returns false and changes
     * nothing if the action is not currently legal, which includes every
     * action once the game is over.
     */
    public applyAction(index: number): boolean {
        if (this._state.gameover) {
            log.debug("rejected action after game over", {index});
            return false;
        }
        if (this._state.phase !== "placement") {
            throw new ProtocolError("WRONG_PHASE", `applyAction is only for placement; the game is in the ${this._state.phase} phase.`);
        }
        const result = this.validateAction(index);
        if (!result.valid) {
            log.debug("rejected action", {index, reason: result.message});
            return false;
        }
        const action = this.catalog.get(index);
        if (action.type !== "place") {
            throw new Error(`Action ${index} passed validation during placement but is not a placement. This should never happen.`);
        }
        const player = this._state.currplayer;
        const resources = this._state.resources[player];
        resources.unplaced.splice(resources.unplaced.indexOf(action.power), 1);
        const hidden = isHiddenPower(action.power);
        const square = this._state.grid[action.row][action.col];
        square.push({owner: player, power: action.power, hidden});
        if (square.length > 2) {
            throw new Error(`Square ${coords2algebraic(action.row, action.col)} holds more than two units. This should never happen.`);
        }
        this.history.push([player, index]);
        this.results.push({type: "place", player, power: action.power, where: coords2algebraic(action.row, action.col), hidden});
        this._state.turn++;
        this._state.currplayer = opponent(player);

        if (this._state.resources[1].unplaced.length === 0 && this._state.resources[2].unplaced.length === 0) {
            this.enterDogfights();
        }
        return true;
    }

    private enterDogfights(): void {
        this._state.phase = "dogfights";
        this._state.dogfightOrder = DOGFIGHT_ORDER
            .filter(([r, c]) => isContested(this._state.grid[r][c]))
            .map(([r, c]): Position => [r, c]);
        this._state.dogfightIndex = 0;
        this.results.push({type: "phase", phase: "dogfights"});
        log.debug("placement complete", {turn: this._state.turn, contested: this._state.dogfightOrder.map(([r, c]) => coords2algebraic(r, c))});
        if (this._state.dogfightOrder.length === 0) {
            this.checkEOG();
        }
    }

    /**
     * Lines first (the priority holder wins if both players have one), then,
     * once no dogfights remain, the controlled-square count.
     */
    private checkEOG(): void {
        const one = hasLine(this._state, 1);
        const two = hasLine(this._state, 2);
        if (one || two) {
            let winner: playerid;
            if (one && two) {
                winner = this._state.priority;
            } else {
                winner = one ? 1 : 2;
            }
            this.endGame([winner], "line");
        } else if (this._state.dogfightIndex >= this._state.dogfightOrder.length) {
            const count1 = countControlled(this._state, 1);
            const count2 = countControlled(this._state, 2);
            if (count1 > count2) {
                this.endGame([1], "count");
            } else if (count2 > count1) {
                this.endGame([2], "count");
            } else {
                this.endGame([1, 2], "count");
            }
        }
    }

    private endGame(winner: playerid[], reason: "line" | "count"): void {
        this._state.phase = "ended";
        this._state.gameover = true;
        this._state.winner = winner;
        this.results.push({type: "eog", reason}, {type: "winners", players: [...winner]});
        log.debug("game over", {reason, winner, turn: this._state.turn});
    }

    public currentDogfightPosition(): Position | undefined {
        if (this._state.phase !== "dogfights") {
            return undefined;
        }
        const pos = this._state.dogfightOrder[this._state.dogfightIndex];
        if (pos === undefined) {
            return undefined;
        }
        return [pos[0], pos[1]];
    }

    /**
     * Starts the next contested square: showdown, then the underdog.
     */
    public beginDogfight(): IDogfightContext {
        if (this._state.phase !== "dogfights") {
            throw new ProtocolError("WRONG_PHASE", `Cannot begin a dogfight during the ${this._state.phase} phase.`);
        }
        if (this._state.dogfight !== null) {
            throw new ProtocolError("DOGFIGHT_ACTIVE", "A dogfight is already in progress.");
        }
        const pos = this.currentDogfightPosition();
        if (pos === undefined) {
            throw new ProtocolError("NO_DOGFIGHTS_LEFT", "Every contested square has been resolved.");
        }
        const before = this._state.priority;
        const turn = openDogfight(this._state, pos);
        this._state.dogfight = turn;
        const where = coords2algebraic(pos[0], pos[1]);
        this.results.push({type: "showdown", where, revealed: this._state.grid[pos[0]][pos[1]].map(u => u.power)});
        if (this._state.priority !== before) {
            this.results.push({type: "priority", holder: this._state.priority});
        }
        log.debug("dogfight begun", {where, underdog: turn.underdog, priority: this._state.priority});
        return this.getDogfightContext();
    }

    private activeDogfight(): IDogfightTurn {
        const df = this._state.dogfight;
        if (df === null) {
            throw new ProtocolError("NO_ACTIVE_DOGFIGHT", "No dogfight is in progress.");
        }
        return df;
    }

    public getDogfightContext(): IDogfightContext {
        this.activeDogfight();
        const ctx = dogfightContext(this._state);
        if (ctx === undefined) {
            throw new ProtocolError("NO_ACTIVE_DOGFIGHT", "No dogfight is in progress.");
        }
        return ctx;
    }

    public getDogfightActor(): playerid {
        const df = this.activeDogfight();
        if (df.complete) {
            throw new ProtocolError("DOGFIGHT_COMPLETE", "The dogfight is complete and waiting to be finished.");
        }
        return df.actor;
    }

    public getDogfightLegalActions(player: playerid): number[] {
        const actor = this.getDogfightActor();
        if (player !== actor) {
            throw new ProtocolError("WRONG_ACTOR", `It is player ${actor}'s turn in this dogfight, not player ${player}'s.`);
        }
        return this.catalog.legalIndices(this._state, player);
    }

    /**
     * Records one negotiation step. Returns false for an action the player
     * cannot take; protocol misuse throws.
     */
    public applyDogfightTurnAction(player: playerid, index: number): boolean {
        const df = this.activeDogfight();
        if (df.complete) {
            throw new ProtocolError("DOGFIGHT_COMPLETE", "The dogfight is complete and waiting to be finished.");
        }
        if (player !== df.actor) {
            throw new ProtocolError("WRONG_ACTOR", `It is player ${df.actor}'s turn in this dogfight, not player ${player}'s.`);
        }
        if (!this.inRange(index) || !this.catalog.isLegal(this._state, player, index)) {
            log.debug("rejected dogfight action", {player, index});
            return false;
        }
        const action = this.catalog.get(index);
        advanceDogfight(df, index, action);
        this.history.push([player, index]);
        if (action.type === "weapon") {
            this.results.push({type: "weapon", player, slot: action.slot});
        } else {
            this.results.push({type: "pass", player});
        }
        return true;
    }

    public isDogfightActive(): boolean {
        return this._state.dogfight !== null;
    }

    public isDogfightComplete(): boolean {
        return this._state.dogfight !== null && this._state.dogfight.complete;
    }

    /**
     * Settles the completed dogfight and runs the end-of-game checks.
     */
    public finishDogfight(): IDogfightResult {
        const df = this.activeDogfight();
        if (!df.complete) {
            throw new ProtocolError("DOGFIGHT_INCOMPLETE", "The dogfight negotiation has not finished.");
        }
        const result = resolveDogfight(this._state, df, this.catalog, this.rng);
        this._state.dogfight = null;
        this._state.dogfightIndex++;
        const where = coords2algebraic(result.position[0], result.position[1]);
        this.results.push({type: "dogfight", where, eliminated: [...result.eliminated], hit: result.hit, draws: [[...result.draws[1]], [...result.draws[2]]]});
        log.debug("dogfight resolved", {where, outcome: result.outcome, eliminated: result.eliminated, hit: result.hit});
        this.checkEOG();
        return result;
    }

    /**
     * A uniformly random legal action for whoever acts next, drawn from the
     * engine's own stream.
     */
    public randomMove(): number {
        if (this._state.gameover) {
            throw new UserFacingError("MOVES_GAMEOVER", i18next.t("gridfight:MOVES_GAMEOVER"));
        }
        if (this._state.phase === "placement") {
            return this.rng.pick(this.getLegalActions());
        }
        return this.rng.pick(this.getDogfightLegalActions(this.getDogfightActor()));
    }

    /**
     * Plays uniformly random actions for both players until the game ends.
     */
    public playout(): void {
        while (!this._state.gameover) {
            if (this._state.phase === "placement") {
                this.applyAction(this.randomMove());
                continue;
            }
            if (!this.isDogfightActive()) {
                this.beginDogfight();
            }
            while (!this.isDogfightComplete()) {
                const actor = this.getDogfightActor();
                this.applyDogfightTurnAction(actor, this.randomMove());
            }
            this.finishDogfight();
        }
    }

    public fingerprint(): string {
        return x2uid({state: this._state, rng: this.rng.state});
    }

    public serialize(): string {
        return JSON.stringify({state: this._state, history: this.history});
    }

    public render(): string {
        return describeState(this._state);
    }

    public clone(): GridfightGame {
        const cloned = GridfightGame.fromSnapshot(this._state, this.rng.state);
        cloned.history = this.history.map(([p, i]): HistoryEntry => [p, i]);
        cloned.results = deepclone(this.results);
        return cloned;
    }
}

/** Read-only view type handed to agents. */
export type GridfightView = DeepReadonly<IGridfightState>;
