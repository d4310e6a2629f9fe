import { BadRequestException, Injectable, PipeTransform } from "@nestjs/common";
import { Cursor, cursorFromString, emptyCursor } from "../dto/envelopes";

/** Decodes the `cursor` query value into an id-keyed {@link Cursor}. */
@Injectable()
export class ParseCursorPipe
	implements PipeTransform<string | undefined, Cursor>
{
	transform(value: string | undefined): Cursor {
		if (value === undefined || value === "") {
			return emptyCursor;
		}
		try {
			return cursorFromString(value);
		} catch {
			throw new BadRequestException(
				"Invalid cursor: expected the id cursor of a previous page",
			);
		}
	}
}
