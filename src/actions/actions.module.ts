import { Module } from '@nestjs/common';
import { CoverageModule } from '../coverage/coverage.module';
import { ActionRegistry } from './action-registry';
import { CheckoutAction } from './checkout.action';
import { CodecovAction } from './codecov.action';
import { SetupPythonAction } from './setup-python.action';
import { STAGE_ACTIONS } from './stage-action';

@Module({
  imports: [CoverageModule],
  providers: [
    CheckoutAction,
    SetupPythonAction,
    CodecovAction,
    {
      provide: STAGE_ACTIONS,
      useFactory: (checkout: CheckoutAction, python: SetupPythonAction, codecov: CodecovAction) => [
        checkout,
        python,
        codecov,
      ],
      inject: [CheckoutAction, SetupPythonAction, CodecovAction],
    },
    ActionRegistry,
  ],
  exports: [ActionRegistry],
})
export class ActionsModule {}
