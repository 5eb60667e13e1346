import { combineReducers } from 'redux';
import Licensing from './Licensing/slice';
import Navigation from './Navigation/slice';
import Packaging from './Packaging/slice';

export default combineReducers({
    Licensing,
    Navigation,
    Packaging,
});
