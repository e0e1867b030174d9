import { Module } from '@nestjs/common';
import { HttpClientFactory } from './http-client.factory';
import { HTTP_FETCH, SLEEP, nodeFetch, sleep } from './http.tokens';

@Module({
  providers: [
    HttpClientFactory,
    { provide: HTTP_FETCH, useValue: nodeFetch },
    { provide: SLEEP, useValue: sleep },
  ],
  exports: [HttpClientFactory, SLEEP],
})
export class HttpModule {}
