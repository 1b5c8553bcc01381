import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Client } from '@notionhq/client';
import { notionConfig } from '@app/shared/config/configuration';
import { NotionService } from './notion.service';
import { NOTION_GATEWAY, createNotionGateway } from './notion.gateway';

@Module({
  providers: [
    {
      provide: NOTION_GATEWAY,
      useFactory: (cfg: ConfigType<typeof notionConfig>) =>
        createNotionGateway(new Client({ auth: cfg.apiKey })),
      inject: [notionConfig.KEY],
    },
    NotionService,
  ],
  exports: [NotionService],
})
export class NotionModule {}
