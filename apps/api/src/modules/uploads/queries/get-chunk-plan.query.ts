import { IQuery } from '@nestjs/cqrs';

export class GetChunkPlanQuery implements IQuery {
    constructor(public readonly fileSize: number) { }
}
