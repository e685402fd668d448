import { Body, Controller, Get, HttpCode, Param, Post } from "@nestjs/common";
import { ValidateBindingsDto } from "./dto/validate-bindings.dto";
import { WebappsService } from "./webapps.service";

@Controller("webapps")
export class WebappsController {
  constructor(private readonly webappsService: WebappsService) {}

  @Get()
  list() {
    return this.webappsService.list();
  }

  @Get(":id/manifest")
  getManifest(@Param("id") id: string) {
    return this.webappsService.getManifest(id);
  }

  @Get(":id/form")
  getForm(@Param("id") id: string) {
    return this.webappsService.getForm(id);
  }

  @Get(":id/summary")
  getSummary(@Param("id") id: string) {
    return this.webappsService.getSummary(id);
  }

  @Post(":id/bindings/validate")
  @HttpCode(200)
  validateBindings(@Param("id") id: string, @Body() body: ValidateBindingsDto) {
    return { bindings: this.webappsService.validateBindings(id, body.bindings) };
  }
}
