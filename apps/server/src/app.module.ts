import { Module } from "@nestjs/common";
import { WebappsModule } from "./modules/webapps/webapps.module";

@Module({
  imports: [WebappsModule]
})
export class AppModule {}
