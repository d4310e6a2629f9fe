import {
	ArgumentsHost,
	Catch,
	ExceptionFilter,
	HttpException,
	Logger,
} from "@nestjs/common";
import type { Request, Response } from "express";
import { isEscrowError } from "../errors";

type ErrorBody = {
	statusCode: number;
	code?: string;
	message: string;
	path: string;
	timestamp: string;
};

@Catch(HttpException)
export class HttpExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(HttpExceptionFilter.name);

	catch(exception: HttpException, host: ArgumentsHost) {
		const ctx = host.switchToHttp();
		const response = ctx.getResponse<Response>();
		const request = ctx.getRequest<Request>();
		const status = exception.getStatus();

		const body: ErrorBody = {
			statusCode: status,
			code: isEscrowError(exception) ? exception.code : undefined,
			message: HttpExceptionFilter.messageOf(exception),
			path: request.url,
			timestamp: new Date().toISOString(),
		};
		if (status >= 500) {
			this.logger.error(`${request.method} ${request.url} -> ${status}`, exception.stack);
		}
		response.status(status).json(body);
	}

	// ValidationPipe puts the list of constraint messages in the response body
	private static messageOf(exception: HttpException): string {
		const res = exception.getResponse();
		if (typeof res === "object" && res !== null && "message" in res) {
			const { message } = res;
			if (Array.isArray(message)) {
				return message.join("; ");
			}
			if (typeof message === "string") {
				return message;
			}
		}
		return exception.message;
	}
}
