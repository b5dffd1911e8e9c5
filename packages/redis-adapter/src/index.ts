export { RedisSagaRepository } from './repository.js';
export type { RedisSagaRepositoryOptions } from './repository.js';
export { RedisCommandChannel, envelopeSchema } from './channel.js';
export type { Envelope, RedisCommandChannelOptions } from './channel.js';
