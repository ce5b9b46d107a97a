import type { OpenedContainer, SupportedContainerFormat } from '../../types/container';
import { openOleContainer } from './oleContainer';
import { openZipContainer } from './zipContainer';

export const openContainer = (
  data: Uint8Array,
  format: SupportedContainerFormat,
): OpenedContainer => {
  switch (format) {
    case 'zip':
      return openZipContainer(data);
    case 'ole':
      return openOleContainer(data);
    default: {
      const exhaustive: never = format;
      throw new Error(`Unsupported container format ${String(exhaustive)}`);
    }
  }
};

export { openOleContainer, openZipContainer };
