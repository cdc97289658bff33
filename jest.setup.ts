import "@testing-library/react-native/extend-expect";
