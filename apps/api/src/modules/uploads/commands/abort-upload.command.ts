interface AbortUploadCommandPayload {
    key: string;
    uploadId: string;
}

export class AbortUploadCommand {
    constructor(public readonly payload: AbortUploadCommandPayload) { }
}
