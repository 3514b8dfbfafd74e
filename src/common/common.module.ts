// Common Module - Shared infrastructure
import { Global, Module } from '@nestjs/common';
import { AppGateway } from './app.gateway';
import { WebSocketService } from './websocket.service';

/**
 * Global so feature modules can inject WebSocketService without importing it.
 */
@Global()
@Module({
  providers: [AppGateway, WebSocketService],
  exports: [WebSocketService],
})
export class CommonModule {}
