import { Module } from "@nestjs/common";

import { WellbeingModule } from "./wellbeing/wellbeing.module";

@Module({
  imports: [WellbeingModule],
})
export class DomainsModule {}
