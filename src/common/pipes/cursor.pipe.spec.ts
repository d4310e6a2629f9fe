import { BadRequestException } from "@nestjs/common";
import { cursorToString, emptyCursor } from "../dto/envelopes";
import { ParseCursorPipe } from "./cursor.pipe";

describe("ParseCursorPipe", () => {
	const pipe = new ParseCursorPipe();

	it("starts from the newest record without a cursor", () => {
		expect(pipe.transform(undefined)).toBe(emptyCursor);
		expect(pipe.transform("")).toBe(emptyCursor);
	});

	it("decodes a cursor issued for a page", () => {
		expect(pipe.transform(cursorToString(17))).toEqual({ idBefore: 17 });
	});

	it.each(["abc", cursorToString(0), cursorToString(-3), "MS41"])(
		"rejects %s",
		(raw) => {
			expect(() => pipe.transform(raw)).toThrow(
				new BadRequestException(
					"Invalid cursor: expected the id cursor of a previous page",
				),
			);
		},
	);
});
