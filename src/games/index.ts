import { GameBase, IGameInformation, IValidationResult, MoveResult, HistoryEntry, Outcome } from "./_base";
import { GridfightGame } from "./gridfight";
import type { GridfightView, playerid, Phase, Position, GridfightSnapshot, IDogfightContext, IDogfightResult } from "./gridfight";
import {
    IGridfightState, IUnit, IPlayerResources, IDogfightTurn, GRID_SIZE, UNIT_POWERS, HIDDEN_POWERS, WEAPON_TOKENS,
    CARD_VALUES, PILE_SIZE, DOGFIGHT_ORDER, LINES, opponent, isHiddenPower, coords2algebraic, copyState, controller,
    countControlled, hasLine, isFreshDogfight, describeState,
} from "./gridfight/board";
import { Action, ActionCatalog, getActionCatalog } from "./gridfight/catalog";
import { DogfightPlay, HIT_THRESHOLD } from "./gridfight/dogfight";

export type {
    IGameInformation, IValidationResult, MoveResult, HistoryEntry, Outcome, GridfightView, playerid, Phase, Position,
    GridfightSnapshot, IDogfightContext, IDogfightResult, IGridfightState, IUnit, IPlayerResources, IDogfightTurn,
    Action, DogfightPlay,
};
export {
    GameBase, GridfightGame, ActionCatalog, getActionCatalog, GRID_SIZE, UNIT_POWERS, HIDDEN_POWERS, WEAPON_TOKENS,
    CARD_VALUES, PILE_SIZE, DOGFIGHT_ORDER, LINES, HIT_THRESHOLD, opponent, isHiddenPower, coords2algebraic, copyState,
    controller, countControlled, hasLine, isFreshDogfight, describeState,
};

const games = new Map<string, typeof GridfightGame>();
games.set(GridfightGame.gameinfo.uid, GridfightGame);
export { games };

// eslint-disable-next-line @typescript-eslint/naming-convention
export const GameFactory = (game: string, seed?: number): GameBase|undefined => {
    switch (game) {
        case "gridfight":
            return new GridfightGame(seed);
    }
    return;
}
