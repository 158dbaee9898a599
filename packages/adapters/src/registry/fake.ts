import type { LogModelInput, ModelRegistry, RegisteredModel } from '@forkline/core';

export class FakeModelRegistry implements ModelRegistry {
    public readonly logged: LogModelInput[] = [];
    private readonly versions = new Map<string, number>();

    public async logModel(input: LogModelInput): Promise<RegisteredModel> {
        this.logged.push(input);
        const version = (this.versions.get(input.registeredName) ?? 0) + 1;
        this.versions.set(input.registeredName, version);
        return { name: input.registeredName, version };
    }
}
