import { Chess } from "chess.js";
import type { Color } from "../types";

export type Position = {
	notation: string;
	color: Color;
};

export type NormalizedMove =
	| { ok: true; move: string }
	| { ok: false; reason: string };

const COORDINATE_PATTERN = /^[a-h][1-8][a-h][1-8][qrbn]?$/;

const ABBREVIATED_PATTERN =
	/^(?:[NBKRQ]?[a-h]?[1-8]?[-x]?[a-h][1-8](?:=?[nbrqNBRQ])?|[O0]-[O0](?:-[O0])?)[+#]?$/;

export const isCoordinateMove = (text: string) =>
	COORDINATE_PATTERN.test(text.toLowerCase());

export const isAbbreviatedMove = (text: string) =>
	ABBREVIATED_PATTERN.test(text);

const FILES = "abcdefgh";

// Expands "rnbqkbnr/pppppppp/8/..." into a square -> piece lookup.
const pieceAt = (placement: string, square: string): string | null => {
	const rows = placement.split("/");
	const file = FILES.indexOf(square.charAt(0));
	const rank = Number(square.charAt(1));
	const row = rows[8 - rank];
	if (row === undefined || file < 0) return null;
	let column = 0;
	for (const char of row) {
		const skip = Number.parseInt(char, 10);
		if (Number.isFinite(skip)) {
			column += skip;
			continue;
		}
		if (column === file) return char;
		column += 1;
	}
	return null;
};

const inferCastling = (placement: string) => {
	let rights = "";
	if (pieceAt(placement, "e1") === "K") {
		if (pieceAt(placement, "h1") === "R") rights += "K";
		if (pieceAt(placement, "a1") === "R") rights += "Q";
	}
	if (pieceAt(placement, "e8") === "k") {
		if (pieceAt(placement, "h8") === "r") rights += "k";
		if (pieceAt(placement, "a8") === "r") rights += "q";
	}
	return rights || "-";
};

/**
 * Full FEN for `notation` with `color` to move. Bare piece placements get
 * castling rights inferred from the home squares.
 */
export const fenForTurn = (notation: string, color: Color): string => {
	const turn = color === "white" ? "w" : "b";
	const fields = notation.trim().split(/\s+/);
	const placement = fields[0] ?? "";
	if (fields.length < 4) {
		return `${placement} ${turn} ${inferCastling(placement)} - 0 1`;
	}
	const flipped = fields[1] !== turn;
	const castling = fields[2] ?? "-";
	const enPassant = flipped ? "-" : (fields[3] ?? "-");
	const halfmove = fields[4] ?? "0";
	const fullmove = fields[5] ?? "1";
	return `${placement} ${turn} ${castling} ${enPassant} ${halfmove} ${fullmove}`;
};

/**
 * Turns chat move text into coordinate notation. Coordinate moves pass
 * through untouched; abbreviated moves must be legal in `position`.
 */
export const validateAndNormalize = (
	position: Position | null,
	text: string,
): NormalizedMove => {
	if (isCoordinateMove(text)) {
		return { ok: true, move: text.toLowerCase() };
	}
	if (!isAbbreviatedMove(text)) {
		return { ok: false, reason: "invalid_format" };
	}
	if (!position) {
		return { ok: false, reason: "position_unavailable" };
	}

	let board: Chess;
	try {
		board = new Chess(fenForTurn(position.notation, position.color));
	} catch {
		return { ok: false, reason: "position_unreadable" };
	}

	const san = text.replace(/0/g, "O");
	try {
		const played = board.move(san);
		if (!played) return { ok: false, reason: "illegal_move" };
		return {
			ok: true,
			move: `${played.from}${played.to}${played.promotion ?? ""}`,
		};
	} catch {
		return { ok: false, reason: "illegal_move" };
	}
};
