import { Global, Module } from "@nestjs/common";
import { accessTokenProvider, ACCESS_TOKEN_PROVIDER } from "./credential.provider";
import { FoundryClient } from "./foundry.client";

@Global()
@Module({
  providers: [accessTokenProvider, FoundryClient],
  exports: [ACCESS_TOKEN_PROVIDER, FoundryClient],
})
export class FoundryModule {}
