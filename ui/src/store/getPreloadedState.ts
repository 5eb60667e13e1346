import { PartialRootState } from './configureStore';
import { locationFromHash } from '../utils/pageHash';

// Deep links such as `#/billing` open the session on that page
const getPreloadedState = (hash: string = ''): PartialRootState => {
    return {
        Navigation: {
            location: locationFromHash(hash),
        },
    };
};

export default getPreloadedState;
