import { range } from "lodash";
import { GridfightGame, DOGFIGHT_ORDER, copyState, isHiddenPower } from "../../src/games";
import type { IGridfightState, IUnit, Position, playerid } from "../../src/games";
import { ProtocolError } from "../../src/common";

export const unit = (owner: playerid, power: number): IUnit => {
    return {owner, power, hidden: isHiddenPower(power)};
}

/**
 * A position at the start of the dogfight phase. Every other square is empty,
 * both hands are empty and both draw piles are in order 1..13.
 */
export const dogfightPosition = (contested: [Position, number, number][], controlled: [Position, playerid, number][] = []): IGridfightState => {
    const state = copyState(new GridfightGame(1).state());
    state.phase = "dogfights";
    state.turn = 18;
    state.currplayer = 1;
    const players: playerid[] = [1, 2];
    for (const p of players) {
        state.resources[p].unplaced = [];
        state.resources[p].drawPile = range(1, 14);
        state.resources[p].discard = [];
    }
    for (const [[r, c], one, two] of contested) {
        state.grid[r][c] = [unit(1, one), unit(2, two)];
    }
    for (const [[r, c], owner, power] of controlled) {
        state.grid[r][c] = [unit(owner, power)];
    }
    state.dogfightOrder = DOGFIGHT_ORDER.filter(([r, c]) => state.grid[r][c].length === 2).map(([r, c]): Position => [r, c]);
    return state;
}

export const protocolCode = (fn: () => unknown): string | undefined => {
    try {
        fn();
    } catch (err) {
        if (err instanceof ProtocolError) {
            return err.code;
        }
        throw err;
    }
    return undefined;
}
