import { Module } from "@nestjs/common";

import { SignalExtractorService } from "./services/signal-extractor.service";

@Module({
  providers: [SignalExtractorService],
  exports: [SignalExtractorService],
})
export class SignalsModule {}
