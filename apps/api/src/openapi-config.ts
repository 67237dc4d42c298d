import type { INestApplication } from "@nestjs/common";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import { SESSION_HEADER } from "@foundry-console/types";

export function createOpenApiDocumentConfig() {
  return new DocumentBuilder()
    .setTitle("Foundry Console API")
    .setDescription(
      `Agent files, threads and orchestrator runs for the control panel. Send ${SESSION_HEADER} to keep per-tab state.`
    )
    .setVersion("1.0.0")
    .addTag("agents")
    .addTag("agent files")
    .addTag("threads")
    .addTag("runs")
    .addTag("session")
    .addTag("health")
    .build();
}

export function configureOpenApi(app: INestApplication): void {
  const config = createOpenApiDocumentConfig();
  const document = SwaggerModule.createDocument(app, config);

  SwaggerModule.setup("openapi", app, document, {
    jsonDocumentUrl: "/openapi.json",
    customSiteTitle: "Foundry Console API Reference",
  });
}
