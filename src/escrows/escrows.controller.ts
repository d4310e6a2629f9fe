import {
	Controller,
	Get,
	Logger,
	Param,
	ParseIntPipe,
	Query,
} from "@nestjs/common";
import {
	ApiExtraModels,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiTags,
} from "@nestjs/swagger";
import {
	ApiEnvelope,
	ApiEnvelopeShellDto,
	ApiPaginatedEnvelope,
	ApiPaginatedMetaDto,
	Cursor,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../common/dto/envelopes";
import { ParseCursorPipe } from "../common/pipes/cursor.pipe";
import { EscrowRegistryService } from "./escrow-registry.service";
import { CustodySummaryDto } from "./dto/custody-summary.dto";
import {
	GetEscrowRecordDto,
	toEscrowRecordDto,
} from "./dto/get-escrow-record.dto";
import { ListEscrowsQueryDto } from "./dto/list-escrows-query.dto";

/**
 * Read-only view of the registry for reporting and UIs. Transitions are not
 * exposed here: they need an authenticated caller from the host system.
 */
@ApiTags("Escrows")
@ApiExtraModels(
	GetEscrowRecordDto,
	CustodySummaryDto,
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
)
@Controller("api/v1/escrows")
export class EscrowsController {
	private readonly logger = new Logger(EscrowsController.name);

	constructor(private readonly registry: EscrowRegistryService) {}

	@Get("")
	@ApiOperation({ summary: "List escrows, newest first" })
	@ApiOkResponse({ schema: getSchemaPathForPaginatedDto(GetEscrowRecordDto) })
	async list(
		@Query() query: ListEscrowsQueryDto,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
	): Promise<ApiPaginatedEnvelope<GetEscrowRecordDto[]>> {
		const { items, nextCursor, total } = await this.registry.list(
			{ party: query.party, status: query.status },
			query.limit ?? 20,
			cursor,
		);
		this.logger.debug(`Listed ${items.length}/${total} escrows`);
		return paginatedEnvelope(items.map(toEscrowRecordDto), {
			nextCursor,
			total,
		});
	}

	@Get("custody")
	@ApiOperation({ summary: "Value held in custody across all escrows" })
	@ApiOkResponse({ schema: getSchemaPathForDto(CustodySummaryDto) })
	async custody(): Promise<ApiEnvelope<CustodySummaryDto>> {
		return envelope(await this.registry.custodySummary());
	}

	@Get(":id")
	@ApiOperation({ summary: "Get one escrow record" })
	@ApiParam({ name: "id", type: Number })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowRecordDto) })
	@ApiNotFoundResponse({ description: "No escrow with this id" })
	async getOne(
		@Param("id", ParseIntPipe) id: number,
	): Promise<ApiEnvelope<GetEscrowRecordDto>> {
		const record = await this.registry.getById(id);
		return envelope(toEscrowRecordDto(record));
	}
}
