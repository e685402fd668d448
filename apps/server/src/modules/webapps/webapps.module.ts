import { Module } from "@nestjs/common";
import { builtinWebapps } from "@paramform/webapps";
import { WEBAPP_ENTRIES } from "./webapps.constants";
import { WebappsController } from "./webapps.controller";
import { WebappsService } from "./webapps.service";

@Module({
  controllers: [WebappsController],
  providers: [{ provide: WEBAPP_ENTRIES, useValue: builtinWebapps }, WebappsService],
  exports: [WebappsService]
})
export class WebappsModule {}
